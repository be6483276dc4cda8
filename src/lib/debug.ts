/**
 * Console logging for server routes and loaders.
 * dlog/dwarn print under `next dev` (NODE_ENV=development) unless SENTINEL_DEBUG says otherwise;
 * derr always prints, and is reserved for fatal conditions reported once at the top level.
 */
import { parseDebugFlag } from "@/config/appConfig";

type DebugEnv = { NODE_ENV?: string; SENTINEL_DEBUG?: string };

export const isDev = (env: DebugEnv = process.env) => env.NODE_ENV === "development";

export const isDebugEnabled = (env: DebugEnv = process.env) => parseDebugFlag(env.SENTINEL_DEBUG) ?? isDev(env);

export const dlog = (...args: unknown[]) => {
  if (isDebugEnabled()) console.log(...args);
};

export const dwarn = (...args: unknown[]) => {
  if (isDebugEnabled()) console.warn(...args);
};

export const derr = (...args: unknown[]) => {
  console.error(...args);
};
