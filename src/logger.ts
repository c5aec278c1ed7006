import createDebug from "debug";
import type { App } from "./types.js";

export const namespace = "tide-calendar";

/** Back the app's debug/error pair with `debug` namespaces. */
export function createApp(name = namespace): App {
  const debug = createDebug(name);
  const error = createDebug(`${name}:error`);

  return {
    debug: (message) => debug(message),
    error: (err) => error(formatError(err)),
  };
}

/** One line per error, following the `cause` chain. */
export function formatError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  if (err.cause === undefined) return err.message;
  return `${err.message} (caused by: ${formatError(err.cause)})`;
}

/** Errors are always shown; anything in DEBUG is added on top. */
export function enableLogging(env: string | undefined = process.env.DEBUG) {
  createDebug.enable([env, `${namespace}:error`].filter(Boolean).join(","));
}
