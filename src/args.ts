export const USAGE = `
postsync — live index of markdown blog posts from a git repository (MCP server)

Usage:
  postsync [options]

Options:
  --config <path>               JSON config file (CLI flags override its values)
  --source <git|memory>         Source of truth (default: git)
  --source-location <url>       Git URL or path of the posts repository
  --checkout <path>             Local working copy (default: repository name in the cwd)
  --branch <name>               Upstream branch to follow (default: the tracking branch)
  --content-folder <path>       Folder holding the posts (default: posts)
  --languages <list>            Comma-separated language tags, default first (default: en)
  --poll-interval <seconds>     Seconds between checks for new commits (default: 60)
  --no-polling                  Build the index once at startup and never refresh it
  --help                        Show this help message
`;

export interface CliArgs {
  configPath?: string;
  help: boolean;
  /** Config values given on the command line, validated later with the file's. */
  overrides: Record<string, unknown>;
}

/** Parse command-line flags. Unknown flags and missing values throw. */
export function parseArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = { help: false, overrides: {} };

  const valueOf = (index: number, flag: string): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    switch (flag) {
      case '--config':
        result.configPath = valueOf(i++, flag);
        break;
      case '--source':
        result.overrides.source = valueOf(i++, flag);
        break;
      case '--source-location':
        result.overrides.sourceLocation = valueOf(i++, flag);
        break;
      case '--checkout':
        result.overrides.checkoutDir = valueOf(i++, flag);
        break;
      case '--branch':
        result.overrides.branch = valueOf(i++, flag);
        break;
      case '--content-folder':
        result.overrides.contentFolder = valueOf(i++, flag);
        break;
      case '--languages':
        result.overrides.languages = valueOf(i++, flag)
          .split(',')
          .map((language) => language.trim())
          .filter((language) => language.length > 0);
        break;
      case '--poll-interval':
        result.overrides.pollIntervalSeconds = Number(valueOf(i++, flag));
        break;
      case '--no-polling':
        result.overrides.pollingEnabled = false;
        break;
      case '--help':
        result.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${flag}`);
    }
  }

  return result;
}
