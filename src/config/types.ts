export type AgentFileConfig = {
  model?: string;
  baseUrl?: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  maxIterations?: number;
  stream?: boolean;
};

export type AgentLoopConfig = {
  agent?: AgentFileConfig;
};
