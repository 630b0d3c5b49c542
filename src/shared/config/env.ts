export type Env = {
  MONGO_URI?: string;
};

const validateMongoUri = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid mongodb:// or mongodb+srv:// URI. Received: ${value}`);
  }

  if (parsed.protocol !== "mongodb:" && parsed.protocol !== "mongodb+srv:") {
    throw new Error(`${name} must use the mongodb or mongodb+srv scheme. Received: ${parsed.protocol}`);
  }

  return value;
};

/**
 * Connection settings. Run recording is opt-in: without MONGO_URI nothing is stored.
 */
export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const raw = env.MONGO_URI?.trim();
  return raw ? { MONGO_URI: validateMongoUri("MONGO_URI", raw) } : {};
};
