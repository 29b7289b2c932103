import pino from "pino";
import env from "./env";

// stdout carries the batch report, so log lines go to stderr
const STDERR_FD = 2;

type PrettyTransport = {
  target: string;
  options: { colorize: boolean; destination: number };
};

let transport: PrettyTransport | undefined = undefined;
if (!env.isProduction && env.NODE_ENV !== "test") {
  try {
    // pino-pretty is optional
    require.resolve("pino-pretty");
    transport = {
      target: "pino-pretty",
      options: { colorize: true, destination: STDERR_FD },
    };
  } catch {
    // optional pretty logging dependency not installed
  }
}

const logger = transport
  ? pino({ name: "bulk-sms-scheduler", level: env.LOG_LEVEL, transport })
  : pino(
      { name: "bulk-sms-scheduler", level: env.LOG_LEVEL },
      pino.destination({ dest: STDERR_FD, sync: true })
    );

export default logger;
