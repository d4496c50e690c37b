/** Options recognised on the command line of the server binary. */
export interface ServerOptions {
  /** Print the usage text and exit. */
  help: boolean;
  /** Print the version and exit. */
  version: boolean;
  /** Overrides `MCP_LOG_FILE` when provided. */
  logFile: string | null;
}

/** Flags expecting a value, either inline (`--flag=value`) or as the next argument. */
const FLAG_WITH_VALUE = new Set(["--log-file"]);

const FLAG_ALIASES: Record<string, string> = {
  "-h": "--help",
  "-V": "--version",
};

export const USAGE = `Usage: gemini-mcp-server [options]

MCP server exposing the Gemini CLI as the \`gemini\` tool over stdio.

Options:
  -h, --help             Show this help and exit
  -V, --version          Show the version and exit
      --log-file <path>  Mirror log lines into <path> (overrides MCP_LOG_FILE)

Environment:
  GEMINI_BIN              Gemini CLI executable (default: gemini)
  GEMINI_DEFAULT_TIMEOUT  Default deadline in seconds, 1-3600 (default: 600)
  GEMINI_FORCE_MODEL      Model used when a request does not set one
  MCP_LOG_FILE            Mirror log lines into this file
  MCP_LOG_REDACT          Log redaction directives (on, off, or secrets to scrub)

Tool parameters:
  PROMPT                  Task text (required)
  sandbox                 Run the CLI in sandbox mode (default: false)
  SESSION_ID              Session to resume (default: new session)
  return_all_messages     Return every captured event (default: false)
  model                   Model override
  timeout_secs            Deadline in seconds, 1-3600

Prompt prefix:
  A GEMINI.md file in the working directory (up to 100000 bytes) is prepended
  to every prompt, separated by a blank line.

Result:
  success, SESSION_ID and agent_messages, plus all_messages when requested.
  Failures carry an error description and the captured events.
`;

/**
 * Parses the server arguments. Unknown flags, positional arguments and flags
 * missing their value throw so the caller can exit with a non-zero status.
 */
export function parseServerOptions(argv: readonly string[]): ServerOptions {
  const options: ServerOptions = { help: false, version: false, logFile: null };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    const separator = arg.indexOf("=");
    const rawFlag = arg.startsWith("--") && separator !== -1 ? arg.slice(0, separator) : arg;
    const flag = FLAG_ALIASES[rawFlag] ?? rawFlag;
    let value = separator !== -1 && rawFlag !== arg ? arg.slice(separator + 1) : undefined;

    if (FLAG_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("-")) {
        throw new Error(`The ${flag} flag requires a value.`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--help":
        options.help = true;
        break;
      case "--version":
        options.version = true;
        break;
      case "--log-file":
        options.logFile = value ?? null;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
}
