export type TransportResponse = {
  status: number;
  body: string;
};

/** Sends one HTTP POST and resolves with the raw status and body text. */
export type Transport = {
  post: (url: string, headers: Record<string, string>, body: string) => Promise<TransportResponse>;
};
