/**
 * Command-line argument parsing. Pure: no I/O, no process access.
 */
import { KilnError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

// ─── Errors ─────────────────────────────────────────────────────

export class CliUsageError extends KilnError {
  constructor(message: string) {
    super({ message, code: 'USAGE_ERROR', exitCode: 2 });
    this.name = 'CliUsageError';
  }
}

// ─── Commands ───────────────────────────────────────────────────

export interface InitArgs {
  command: 'init';
  name: string;
  template?: string;
  preset?: string;
  langVersion?: string;
  claudeVersion?: string;
  claudeProvider?: string;
  httpProxy?: string;
  httpsProxy?: string;
  noProxy?: string;
  workspaceDir?: string;
  output?: string;
  dryRun: boolean;
  yes: boolean;
  git: boolean;
}

export interface GenerateArgs {
  command: 'generate';
  specFile: string;
  preset?: string;
  output?: string;
  dryRun: boolean;
  git: boolean;
}

export interface ValidateArgs {
  command: 'validate';
  specFile: string;
  preset?: string;
}

export interface DiffArgs {
  command: 'diff';
  specFile: string;
  preset?: string;
  output?: string;
  /** Print only the per-file summary, without patches. */
  stat: boolean;
}

export interface DoctorArgs {
  command: 'doctor';
  /** Project directory; defaults to the working directory. */
  dir?: string;
}

export interface ProviderEnvArgs {
  command: 'provider-env';
  marker?: string;
  output?: string;
  /** Print `export` lines instead of an env file. */
  shell: boolean;
}

export type CliArgs =
  | InitArgs
  | GenerateArgs
  | ValidateArgs
  | DiffArgs
  | DoctorArgs
  | ProviderEnvArgs
  | { command: 'list-templates' }
  | { command: 'list-presets' }
  | { command: 'help' };

type CommandName = Exclude<CliArgs['command'], 'help'>;

interface FlagSpec {
  values: readonly string[];
  switches: readonly string[];
}

const FLAGS: Readonly<Record<CommandName, FlagSpec>> = {
  init: {
    values: [
      'template',
      'preset',
      'lang-version',
      'claude-version',
      'claude-provider',
      'proxy',
      'http-proxy',
      'https-proxy',
      'no-proxy',
      'workspace',
      'output',
    ],
    switches: ['dry-run', 'yes', 'no-git'],
  },
  generate: { values: ['preset', 'output'], switches: ['dry-run', 'no-git'] },
  validate: { values: ['preset'], switches: [] },
  diff: { values: ['preset', 'output'], switches: ['stat'] },
  doctor: { values: ['dir'], switches: [] },
  'provider-env': { values: ['marker', 'output'], switches: ['shell'] },
  'list-templates': { values: [], switches: [] },
  'list-presets': { values: [], switches: [] },
};

const SHORT_FLAGS: Readonly<Record<string, string>> = { '-y': 'yes' };

function isCommandName(value: string): value is CommandName {
  return Object.hasOwn(FLAGS, value);
}

// ─── Tokenizing ─────────────────────────────────────────────────

interface ParsedFlags {
  positionals: string[];
  values: Map<string, string>;
  switches: Set<string>;
}

function parseFlags(command: CommandName, tokens: readonly string[]): Result<ParsedFlags, CliUsageError> {
  const spec = FLAGS[command];
  const parsed: ParsedFlags = { positionals: [], values: new Map(), switches: new Set() };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? '';
    const short = SHORT_FLAGS[token];
    const flag = short ?? (token.startsWith('--') ? token.slice(2) : undefined);

    if (flag === undefined) {
      parsed.positionals.push(token);
      continue;
    }

    const eq = flag.indexOf('=');
    const name = eq === -1 ? flag : flag.slice(0, eq);

    if (spec.switches.includes(name) && eq === -1) {
      parsed.switches.add(name);
    } else if (spec.values.includes(name)) {
      let value: string | undefined = eq === -1 ? undefined : flag.slice(eq + 1);
      if (value === undefined) {
        const next = tokens[i + 1];
        if (next !== undefined && !next.startsWith('-')) {
          value = next;
          i++;
        }
      }
      if (value === undefined || value === '') {
        return err(new CliUsageError(`Option --${name} requires a value`));
      }
      parsed.values.set(name, value);
    } else {
      return err(new CliUsageError(`Unknown option ${token} for ${command}`));
    }
  }

  return ok(parsed);
}

function singlePositional(
  command: string,
  positionals: readonly string[],
  what: string,
): Result<string, CliUsageError> {
  const [first, extra] = positionals;
  if (first === undefined) return err(new CliUsageError(`${command} requires ${what}`));
  if (extra !== undefined) return err(new CliUsageError(`Unexpected argument "${extra}"`));
  return ok(first);
}

// ─── Parser ─────────────────────────────────────────────────────

export function parseCliArgs(argv: readonly string[]): Result<CliArgs, CliUsageError> {
  const [command, ...rest] = argv;
  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    return ok({ command: 'help' });
  }
  if (!isCommandName(command)) {
    return err(new CliUsageError(`Unknown command "${command}"`));
  }
  if (rest.includes('--help') || rest.includes('-h')) {
    return ok({ command: 'help' });
  }

  const flags = parseFlags(command, rest);
  if (!flags.ok) return flags;
  const { positionals, values, switches } = flags.value;

  switch (command) {
    case 'init': {
      const name = singlePositional('init', positionals, 'a project name');
      if (!name.ok) return name;
      if (values.has('template') && values.has('preset')) {
        return err(new CliUsageError('--template and --preset cannot be used together'));
      }
      const proxy = values.get('proxy');
      return ok({
        command,
        name: name.value,
        template: values.get('template'),
        preset: values.get('preset'),
        langVersion: values.get('lang-version'),
        claudeVersion: values.get('claude-version'),
        claudeProvider: values.get('claude-provider'),
        httpProxy: values.get('http-proxy') ?? proxy,
        httpsProxy: values.get('https-proxy') ?? proxy,
        noProxy: values.get('no-proxy'),
        workspaceDir: values.get('workspace'),
        output: values.get('output'),
        dryRun: switches.has('dry-run'),
        yes: switches.has('yes'),
        git: !switches.has('no-git'),
      });
    }

    case 'generate': {
      const specFile = singlePositional('generate', positionals, 'a specification file');
      if (!specFile.ok) return specFile;
      return ok({
        command,
        specFile: specFile.value,
        preset: values.get('preset'),
        output: values.get('output'),
        dryRun: switches.has('dry-run'),
        git: !switches.has('no-git'),
      });
    }

    case 'validate': {
      const specFile = singlePositional('validate', positionals, 'a specification file');
      if (!specFile.ok) return specFile;
      return ok({ command, specFile: specFile.value, preset: values.get('preset') });
    }

    case 'diff': {
      const specFile = singlePositional('diff', positionals, 'a specification file');
      if (!specFile.ok) return specFile;
      return ok({
        command,
        specFile: specFile.value,
        preset: values.get('preset'),
        output: values.get('output'),
        stat: switches.has('stat'),
      });
    }

    case 'doctor': {
      const [extra] = positionals;
      if (extra !== undefined) return err(new CliUsageError(`Unexpected argument "${extra}"`));
      return ok({ command, dir: values.get('dir') });
    }

    case 'provider-env':
    case 'list-templates':
    case 'list-presets': {
      const [extra] = positionals;
      if (extra !== undefined) return err(new CliUsageError(`Unexpected argument "${extra}"`));
      if (command !== 'provider-env') return ok({ command });
      return ok({
        command,
        marker: values.get('marker'),
        output: values.get('output'),
        shell: switches.has('shell'),
      });
    }
  }
}

export const USAGE = `Usage: kiln <command> [options]

Commands:
  init <name>          Create a project from a template or preset
      --template=T | --preset=P
      --lang-version=V --claude-version=V --claude-provider=P
      --proxy=URL --http-proxy=URL --https-proxy=URL --no-proxy=HOSTS
      --workspace=DIR --output=DIR --dry-run --no-git --yes
  generate <file>      Generate or update a project from a specification
      --preset=P --output=DIR --dry-run --no-git
  validate <file>      Check a specification without writing anything
      --preset=P
  diff <file>          Show what generate would change on disk
      --preset=P --output=DIR --stat
  doctor               Check host tools and a generated project
      --dir=DIR
  list-templates       List available templates
  list-presets         List available presets
  provider-env         Print credentials for the project's provider
      --marker=FILE --output=FILE --shell`;
