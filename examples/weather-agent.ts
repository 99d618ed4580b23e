import { createAgent, type RunContext, type ToolDescriptor } from "../src/index.js";
import { requireProvider } from "./provider.js";

type Coordinates = { lat: number; lng: number };

/** Stand-in geocoder; a real agent would call a geocoding API here. */
const LOCATIONS: Record<string, Coordinates> = {
  "San Francisco": { lat: 37.7749, lng: -122.4194 },
  "New York": { lat: 40.7128, lng: -74.006 },
  London: { lat: 51.5074, lng: -0.1278 },
  Tokyo: { lat: 35.6762, lng: 139.6503 },
  Paris: { lat: 48.8566, lng: 2.3522 },
  Sydney: { lat: -33.8688, lng: 151.2093 },
  Miami: { lat: 25.7617, lng: -80.1918 },
  Seattle: { lat: 47.6062, lng: -122.3321 },
};

const CONDITIONS = ["Sunny", "Partly Cloudy", "Cloudy", "Rainy", "Foggy"];

function mockWeather(lat: number, lng: number) {
  const temperature = Math.floor(90 - Math.abs(lat) * 0.8 + ((((lng % 10) + 10) % 10) - 5));
  return {
    temperature,
    condition: CONDITIONS[((temperature % 5) + 5) % 5] ?? "Sunny",
    humidity: Math.round(50 + Math.abs(lng % 30)),
    windSpeed: Math.round(5 + Math.abs(lat % 15)),
  };
}

function field(args: unknown, key: string): unknown {
  return typeof args === "object" && args !== null ? Object.getOwnPropertyDescriptor(args, key)?.value : undefined;
}

function units(ctx: RunContext): "fahrenheit" | "celsius" {
  return ctx.deps.temperatureUnits === "celsius" ? "celsius" : "fahrenheit";
}

const getLatLng: ToolDescriptor = {
  description: "Convert a location name into latitude and longitude coordinates",
  parameters: {
    type: "object",
    properties: { location: { type: "string", description: "City or place name" } },
    required: ["location"],
  },
  handler: (_ctx, args) => {
    const query = String(field(args, "location") ?? "").toLowerCase();
    const match = Object.entries(LOCATIONS).find(([city]) => {
      const name = city.toLowerCase();
      return name.includes(query) || query.includes(name);
    });
    if (!match || query === "") {
      return { error: `Location not found: ${query}`, availableLocations: Object.keys(LOCATIONS) };
    }
    const [location, coords] = match;
    return { location, latitude: coords.lat, longitude: coords.lng };
  },
};

const getWeather: ToolDescriptor = {
  description: "Get current weather for latitude and longitude coordinates",
  parameters: {
    type: "object",
    properties: {
      latitude: { type: "number", description: "Latitude (-90 to 90)" },
      longitude: { type: "number", description: "Longitude (-180 to 180)" },
    },
    required: ["latitude", "longitude"],
  },
  handler: (ctx, args) => {
    const lat = Number(field(args, "latitude"));
    const lng = Number(field(args, "longitude"));
    if (!(lat >= -90 && lat <= 90 && lng >= -180 && lng <= 180)) {
      return { error: "Invalid coordinates. Latitude must be -90 to 90, longitude -180 to 180" };
    }
    const weather = mockWeather(lat, lng);
    const unit = units(ctx);
    const temperature = unit === "celsius" ? Math.floor(((weather.temperature - 32) * 5) / 9) : weather.temperature;
    return { ...weather, temperature, units: unit };
  },
};

const provider = requireProvider();
const base = { model: provider.model, baseUrl: provider.baseUrl, apiKey: provider.apiKey, temperature: 0.3 };

console.log("=== Tool chaining ===");
const agent = createAgent({
  ...base,
  systemPrompt: (ctx) =>
    `You are a weather assistant. Always call get_lat_lng first, then get_weather with the coordinates. Report temperatures in ${units(ctx)}.`,
  tools: { get_lat_lng: getLatLng, get_weather: getWeather },
});

for (const temperatureUnits of ["fahrenheit", "celsius"]) {
  const result = await agent.run("What's the weather like in Miami?", { deps: { temperatureUnits } });
  console.log(`\n[${temperatureUnits}] ${String(result.data)}`);
  for (const message of result.messages) {
    for (const call of message.toolCalls ?? []) {
      console.log(`  -> ${call.function.name}(${call.function.arguments})`);
    }
    if (message.role === "tool") {
      console.log(`  <- ${message.content ?? ""}`);
    }
  }
}

console.log("\n=== Structured output ===");
const structured = createAgent({
  ...base,
  systemPrompt: "You are a weather assistant. Use the tools, then report the weather in the requested format.",
  tools: { get_lat_lng: getLatLng, get_weather: getWeather },
  outputSchema: {
    type: "object",
    properties: {
      location: { type: "string" },
      temperature: { type: "number", description: "Temperature in Fahrenheit" },
      condition: { type: "string" },
      summary: { type: "string", description: "A brief weather summary" },
    },
    required: ["location", "temperature", "condition", "summary"],
  },
});
const report = await structured.run("What's the weather in London?");
console.log(JSON.stringify(report.data, null, 2));
