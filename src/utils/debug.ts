/**
 * Debug logging, enabled by COLSHAPE_DEBUG=true or NODE_ENV=development
 * Everything goes to stderr so it never mixes with table output on stdout
 */

const isDev = process.env.NODE_ENV === "development";
const isDebug = process.env.COLSHAPE_DEBUG === "true";
const enabled = isDev || isDebug;

const noop = (..._args: unknown[]): void => {};

export const debug = {
  log: enabled ? console.error.bind(console, "[colshape]") : noop,
  error: enabled ? console.error.bind(console, "[colshape:error]") : noop,
  warn: enabled ? console.error.bind(console, "[colshape:warn]") : noop,
  info: enabled ? console.error.bind(console, "[colshape:info]") : noop,
};
