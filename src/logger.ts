import pino from "pino";

const level = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info");

// stdout belongs to the wrapped package managers; logs always go to stderr.
export const logger =
  process.env.NODE_ENV === "development"
    ? pino({ name: "archup", level, transport: { target: "pino/file", options: { destination: 2 } } })
    : pino({ name: "archup", level }, pino.destination({ dest: 2, sync: true }));
