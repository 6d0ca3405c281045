export type Env = {
  MONGO_URI: string;
  GEO_API_BASE_URL: string;
  OUTPUT_DIR: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = env.MONGO_URI ?? "mongodb://localhost:27017/relay-scout";
  const GEO_API_BASE_URL = validateHttpUrl("GEO_API_BASE_URL", env.GEO_API_BASE_URL ?? "http://ip-api.com");
  const OUTPUT_DIR = env.OUTPUT_DIR?.trim() ? env.OUTPUT_DIR.trim() : "ip_results";

  return { MONGO_URI, GEO_API_BASE_URL, OUTPUT_DIR };
};
