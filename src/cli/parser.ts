import { UsageError } from "../utils/errors";

export type ParsedArgs = { kind: "help" } | { kind: "run"; inputPath: string };

export function usage(): string {
  return [
    "Usage:",
    "  bulk-sms-scheduler <phone-numbers-file>",
    "",
    "One E.164 number (+ followed by 11 digits) per line.",
    "Credentials come from SMS_CONFIG_PATH (default ./config.json); the message",
    "body and send time from SMS_MESSAGE_BODY, SMS_SEND_AT and SMS_TIMEZONE.",
  ].join("\n");
}

export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes("--help") || argv.includes("-h")) {
    return { kind: "help" };
  }

  const flag = argv.find((arg) => arg.startsWith("-") && arg !== "-");
  if (flag) {
    throw new UsageError(`Unknown option: ${flag}\n${usage()}`);
  }

  if (argv.length !== 1) {
    throw new UsageError(
      `Expected exactly one phone numbers file, got ${argv.length}.\n${usage()}`
    );
  }

  return { kind: "run", inputPath: argv[0] };
}
