export { CliUsageError, USAGE, parseCliArgs } from './args.js';
export type {
  CliArgs,
  DiffArgs,
  DoctorArgs,
  GenerateArgs,
  InitArgs,
  ProviderEnvArgs,
  ValidateArgs,
} from './args.js';
export { runCli } from './cli.js';
export type { CliIO } from './cli.js';
