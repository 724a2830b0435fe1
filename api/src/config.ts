// api/src/config.ts
import dotenv from "dotenv";
dotenv.config();

interface Config {
  port: number;
  datasetPath: string;
  corsOrigin: string[];
  sessionIdleMinutes: number;
  nodeEnv: "development" | "production" | "test";
}

const NODE_ENVS: ReadonlyArray<Config["nodeEnv"]> = ["development", "production", "test"];

function parseNodeEnv(raw: string | undefined): Config["nodeEnv"] {
  const value = raw || "development";
  const match = NODE_ENVS.find((env) => env === value);
  if (!match) {
    throw new Error(`NODE_ENV must be one of ${NODE_ENVS.join(", ")}, got "${value}"`);
  }
  return match;
}

function validateEnv(): Config {
  const port = parseInt(process.env.PORT || "8080", 10);
  if (!Number.isFinite(port) || port <= 0) {
    throw new Error(`PORT must be a positive integer, got "${process.env.PORT}"`);
  }

  const sessionIdleMinutes = Number(process.env.SESSION_IDLE_MINUTES || "120");
  if (!Number.isFinite(sessionIdleMinutes) || sessionIdleMinutes <= 0) {
    throw new Error(`SESSION_IDLE_MINUTES must be a positive number, got "${process.env.SESSION_IDLE_MINUTES}"`);
  }

  return {
    port,
    datasetPath: process.env.DATASET_PATH || "api/data/Cleaned-Data.csv",
    corsOrigin: (process.env.CORS_ORIGIN || "http://localhost:5173").split(","),
    sessionIdleMinutes,
    nodeEnv: parseNodeEnv(process.env.NODE_ENV),
  };
}

export const config = validateEnv();
