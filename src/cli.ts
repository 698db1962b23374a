/**
 * CLI Argument Parsing and Help
 */

import { PERMISSION_MODES, type PermissionMode } from './tools/types.js';
import { ConfigError } from './errors/index.js';

export const VERSION = '0.1.0';

/**
 * CLI arguments structure.
 */
export interface CLIArgs {
  help: boolean;
  version: boolean;
  debug: boolean;
  /** `tidecode configure` */
  configure: boolean;
  workspace?: string;
  provider?: string;
  model?: string;
  baseUrl?: string;
  permission?: PermissionMode;
  maxIterations?: number;
  /** Single task; absent means REPL */
  task?: string;
}

function isPermissionMode(value: string): value is PermissionMode {
  return PERMISSION_MODES.some(mode => mode === value);
}

/**
 * Parse command-line arguments (without the node and script entries).
 * Everything from the first positional argument on is the task.
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CLIArgs {
  const result: CLIArgs = {
    help: false,
    version: false,
    debug: false,
    configure: false,
  };

  let start = 0;
  if (args[0] === 'configure') {
    result.configure = true;
    start = 1;
  }

  const valueOf = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined || value.startsWith('-')) {
      throw new ConfigError(`Option ${flag} requires a value`, { flag });
    }
    return value;
  };

  for (let i = start; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--debug') {
      result.debug = true;
    } else if (arg === '--workspace' || arg === '-w') {
      result.workspace = valueOf(arg, ++i);
    } else if (arg === '--provider' || arg === '-p') {
      result.provider = valueOf(arg, ++i);
    } else if (arg === '--model' || arg === '-m') {
      result.model = valueOf(arg, ++i);
    } else if (arg === '--base-url') {
      result.baseUrl = valueOf(arg, ++i);
    } else if (arg === '--permission') {
      const mode = valueOf(arg, ++i);
      if (!isPermissionMode(mode)) {
        throw new ConfigError(
          `Invalid permission mode '${mode}'. Expected one of: ${PERMISSION_MODES.join(', ')}`,
          { flag: arg }
        );
      }
      result.permission = mode;
    } else if (arg === '--yolo') {
      result.permission = 'yolo';
    } else if (arg === '--max-iterations') {
      const raw = valueOf(arg, ++i);
      const value = Number(raw);
      if (!Number.isInteger(value) || value < 1) {
        throw new ConfigError(`--max-iterations must be a positive integer, got '${raw}'`, { flag: arg });
      }
      result.maxIterations = value;
    } else if (arg === '--') {
      const rest = args.slice(i + 1).join(' ').trim();
      if (rest) result.task = rest;
      break;
    } else if (arg.startsWith('-')) {
      throw new ConfigError(`Unknown option ${arg}. Run tidecode --help for usage.`, { flag: arg });
    } else {
      result.task = args.slice(i).join(' ');
      break;
    }
  }

  return result;
}

/**
 * Help text shown by --help.
 */
export function getHelpText(): string {
  return `tidecode ${VERSION} - a coding agent for your terminal, on local or hosted models

USAGE:
  tidecode [OPTIONS] [TASK]
  tidecode configure

  With a TASK, runs it once and prints the answer. Without, starts a REPL.

COMMANDS:
  configure                 Interactive setup (provider, base URL, model, API key)

OPTIONS:
  -w, --workspace DIR       Directory the agent may touch (default: current directory)
  -p, --provider NAME       Provider profile: lm_studio, ollama, openai, mistral,
                            or one defined in config
  -m, --model MODEL         Model name
      --base-url URL        OpenAI-compatible endpoint, e.g. http://localhost:1234/v1
      --permission MODE     How risky shell commands are handled:
                              strict      - refuse them
                              interactive - ask (default)
                              yolo        - run them
      --yolo                Shorthand for --permission yolo
      --max-iterations N    Provider requests per task (default: 50)
      --debug               Verbose logging on stderr
  -h, --help                Show this help
  -v, --version             Show version

REPL COMMANDS:
  /help  /clear  /logs  /exit

ENVIRONMENT:
  TIDECODE_API_KEY          API key for the active provider
  OPENAI_API_KEY            Used for the openai profile when TIDECODE_API_KEY is unset
  MISTRAL_API_KEY           Used for the mistral profile when TIDECODE_API_KEY is unset
  TIDECODE_LOG_LEVEL        debug, info, warn, error or silent

FILES:
  ~/.config/tidecode/config.json   User config (respects XDG_CONFIG_HOME)
  .tidecode/config.json            Project config, overrides user config
`;
}
