/**
 * Kiln command-line interface.
 *
 * `runCli` wires settings, catalog and pipeline together for one command and
 * returns the process exit code. Output goes through the injected io so the
 * whole surface can run in-process.
 */
import { chmod, mkdir, readdir, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';

import { buildSpecDocument } from '@/config/document-builder.js';
import { loadSpecDocument } from '@/config/loader.js';
import { createConfigResolver } from '@/config/resolver.js';
import { loadKilnSettings } from '@/config/settings.js';
import type { KilnSettings } from '@/config/settings.js';
import { DEFAULT_TEMPLATE } from '@/config/types.js';
import {
  PROVIDER_MARKER_PATH,
  formatEnvExports,
  formatEnvFile,
  loadProviderCredentials,
} from '@/container/provider-state.js';
import {
  FeatureBundleMissingError,
  GenerationError,
  TemplateRenderError,
  ValidationError,
} from '@/core/errors.js';
import type { KilnError } from '@/core/errors.js';
import { pathExists } from '@/core/fs.js';
import { diffProject } from '@/diff/project-diff.js';
import type { ProjectDiff } from '@/diff/types.js';
import { createDoctor } from '@/doctor/doctor.js';
import type { DoctorReport } from '@/doctor/types.js';
import { createFeatureProvisioner } from '@/features/provisioner.js';
import { createGenerator } from '@/generator/generator.js';
import type { Generator } from '@/generator/generator.js';
import type { GenerateRequest, GenerationResult } from '@/generator/types.js';
import type { Logger } from '@/observability/logger.js';
import { createLogger } from '@/observability/logger.js';
import { createCommandRunner, createGitRunner } from '@/repository/git-runner.js';
import { createRepositoryInitializer } from '@/repository/initializer.js';
import type { CommandRunner, GitRunner } from '@/repository/types.js';
import { loadTemplateCatalog } from '@/templates/catalog.js';
import type { TemplateCatalog } from '@/templates/catalog.js';

import type {
  DiffArgs,
  DoctorArgs,
  GenerateArgs,
  InitArgs,
  ProviderEnvArgs,
  ValidateArgs,
} from './args.js';
import { CliUsageError, USAGE, parseCliArgs } from './args.js';

// ─── ANSI Colors ────────────────────────────────────────────────

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';

// ─── IO ─────────────────────────────────────────────────────────

export interface CliIO {
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Write one line to standard output. */
  stdout(line: string): void;
  /** Write one line to standard error. */
  stderr(line: string): void;
  /** Use ANSI colors. */
  color?: boolean;
  logger?: Logger;
  git?: GitRunner;
  docker?: CommandRunner;
}

interface CommandContext {
  io: CliIO;
  settings: KilnSettings;
  logger: Logger;
}

function paint(io: CliIO, color: string, text: string): string {
  return io.color ? `${color}${text}${RESET}` : text;
}

// ─── Error Output ───────────────────────────────────────────────

/** Offending field, token or bundle for errors that name one. */
function errorDetails(error: KilnError): string[] {
  if (error instanceof ValidationError) {
    return error.issues.map((issue) => `  ${issue.path || '(root)'}: ${issue.message}`);
  }
  if (error instanceof TemplateRenderError) {
    const tokens = error.context?.['missingTokens'];
    return [`  token: ${Array.isArray(tokens) ? tokens.join(', ') : error.token}`];
  }
  if (error instanceof FeatureBundleMissingError) {
    return [`  bundle: ${error.bundle}`];
  }
  return [];
}

/** Print `error [<step>] <message>` plus details; returns the exit code. */
function fail(io: CliIO, error: KilnError): number {
  const reason = error instanceof GenerationError ? error.reason : error;
  const label = error instanceof GenerationError ? `error [${error.step}]` : 'error:';
  io.stderr(`${paint(io, RED, label)} ${error.message}`);
  for (const line of errorDetails(reason)) io.stderr(line);
  return error.exitCode;
}

// ─── Report Output ──────────────────────────────────────────────

function printResult(io: CliIO, result: GenerationResult, outputDir: string, dryRun: boolean): void {
  const { report, spec, repository } = result;

  io.stdout(
    dryRun
      ? paint(io, BOLD, `Dry run for ${spec.name} in ${outputDir}; nothing written`)
      : paint(io, BOLD, `Generated ${spec.name} in ${outputDir}`),
  );
  for (const path of report.created) io.stdout(`  ${paint(io, GREEN, 'created ')} ${path}`);
  for (const path of report.modified) io.stdout(`  ${paint(io, YELLOW, 'modified')} ${path}`);
  for (const path of report.skipped) io.stdout(`  ${paint(io, DIM, 'skipped ')} ${path}`);
  io.stdout(
    `${report.created.length} created, ${report.modified.length} modified, ${report.skipped.length} unchanged`,
  );
  if (repository) io.stdout(`Repository: ${repository.status}`);

  for (const warning of report.warnings) {
    io.stderr(`${paint(io, YELLOW, 'warning:')} ${warning.message}`);
  }
}

function printDiff(io: CliIO, diff: ProjectDiff, statOnly: boolean): void {
  for (const file of diff.files) {
    if (statOnly) {
      const color = file.change === 'create' ? GREEN : file.change === 'modify' ? YELLOW : RED;
      io.stdout(`  ${paint(io, color, file.change)} ${file.path} (+${file.linesAdded} -${file.linesRemoved})`);
      continue;
    }
    if (file.patch === undefined) {
      io.stdout(`Binary file ${file.path} differs`);
      continue;
    }
    for (const line of file.patch.trimEnd().split('\n')) {
      if (line.startsWith('+') && !line.startsWith('+++')) io.stdout(paint(io, GREEN, line));
      else if (line.startsWith('-') && !line.startsWith('---')) io.stdout(paint(io, RED, line));
      else io.stdout(line);
    }
  }
  io.stdout(
    `${diff.create.length} to create, ${diff.modify.length} to modify, ${diff.orphan.length} orphaned, ${diff.unchanged.length} unchanged`,
  );
}

const STATUS_COLORS = { ok: GREEN, warning: YELLOW, error: RED, missing: RED } as const;

function printDoctorReport(io: CliIO, report: DoctorReport): void {
  const width = Math.max(0, ...report.checks.map((check) => check.name.length));
  for (const check of report.checks) {
    const status = paint(io, STATUS_COLORS[check.status], check.status.padEnd(7));
    io.stdout(`${status} ${check.name.padEnd(width)}  ${check.message}`);
    if (check.suggestion) io.stdout(`        hint: ${check.suggestion}`);
  }

  const problems = report.checks.filter((check) => check.status === 'error' || check.status === 'missing');
  io.stdout(
    problems.length === 0
      ? 'No problems found'
      : `${problems.length} problem${problems.length === 1 ? '' : 's'} found`,
  );
}

// ─── Wiring ─────────────────────────────────────────────────────

async function loadCatalog(ctx: CommandContext): Promise<TemplateCatalog | number> {
  const catalog = await loadTemplateCatalog({ root: ctx.settings.assetsRoot, logger: ctx.logger });
  return catalog.ok ? catalog.value : fail(ctx.io, catalog.error);
}

function buildGenerator(ctx: CommandContext, catalog: TemplateCatalog): Generator {
  const { settings, logger } = ctx;
  return createGenerator({
    catalog,
    resolver: createConfigResolver({ catalog, logger }),
    provisioner: createFeatureProvisioner({ bundlesRoot: join(settings.assetsRoot, 'features'), logger }),
    initializer: createRepositoryInitializer({
      git: ctx.io.git ?? createGitRunner(),
      logger,
      author: settings.gitAuthor,
    }),
    logger,
    registryPath: settings.registryPath,
    assetsRoot: settings.assetsRoot,
  });
}

async function runGeneration(
  ctx: CommandContext,
  catalog: TemplateCatalog,
  request: GenerateRequest,
): Promise<number> {
  const result = await buildGenerator(ctx, catalog).generate(request);
  if (!result.ok) return fail(ctx.io, result.error);

  printResult(ctx.io, result.value, request.outputDir, request.dryRun ?? false);
  return 0;
}

async function isNonEmptyDirectory(path: string): Promise<boolean> {
  if (!(await pathExists(path))) return false;
  return (await readdir(path)).length > 0;
}

// ─── Commands ───────────────────────────────────────────────────

async function runInit(ctx: CommandContext, args: InitArgs): Promise<number> {
  const catalog = await loadCatalog(ctx);
  if (typeof catalog === 'number') return catalog;

  const outputDir = resolve(ctx.io.cwd, args.output ?? args.name);
  if (!args.yes && !args.dryRun && (await isNonEmptyDirectory(outputDir))) {
    return fail(
      ctx.io,
      new CliUsageError(`Directory ${outputDir} is not empty; pass --yes to generate into it`),
    );
  }

  const templateName =
    args.template ?? (args.preset ? catalog.getPreset(args.preset)?.template : undefined) ?? DEFAULT_TEMPLATE;
  const document = buildSpecDocument({
    name: args.name,
    template: templateName,
    image: catalog.getTemplate(templateName)?.image ?? undefined,
    workspaceDir: args.workspaceDir,
    langVersion: args.langVersion,
    claudeVersion: args.claudeVersion,
    claudeProvider: args.claudeProvider,
    httpProxy: args.httpProxy,
    httpsProxy: args.httpsProxy,
    noProxy: args.noProxy,
  });

  return runGeneration(ctx, catalog, {
    document,
    preset: args.preset,
    outputDir,
    dryRun: args.dryRun,
    writeDocument: true,
    initRepository: args.git,
  });
}

async function runGenerate(ctx: CommandContext, args: GenerateArgs): Promise<number> {
  const specPath = resolve(ctx.io.cwd, args.specFile);
  const document = await loadSpecDocument(specPath, ctx.io.env);
  if (!document.ok) return fail(ctx.io, document.error);

  const catalog = await loadCatalog(ctx);
  if (typeof catalog === 'number') return catalog;

  return runGeneration(ctx, catalog, {
    document: document.value,
    preset: args.preset,
    outputDir: resolve(ctx.io.cwd, args.output ?? dirname(specPath)),
    dryRun: args.dryRun,
    initRepository: args.git,
  });
}

async function runValidate(ctx: CommandContext, args: ValidateArgs): Promise<number> {
  const document = await loadSpecDocument(resolve(ctx.io.cwd, args.specFile), ctx.io.env);
  if (!document.ok) return fail(ctx.io, document.error);

  const catalog = await loadCatalog(ctx);
  if (typeof catalog === 'number') return catalog;

  const spec = createConfigResolver({ catalog, logger: ctx.logger }).resolve({
    document: document.value,
    preset: args.preset,
  });
  if (!spec.ok) return fail(ctx.io, new GenerationError('resolve', spec.error));

  ctx.io.stdout(
    `${args.specFile}: ${paint(ctx.io, GREEN, 'valid')} (${spec.value.name}, template ${spec.value.template}, schema ${spec.value.schemaVersion})`,
  );
  return 0;
}

async function runDiff(ctx: CommandContext, args: DiffArgs): Promise<number> {
  const specPath = resolve(ctx.io.cwd, args.specFile);
  const document = await loadSpecDocument(specPath, ctx.io.env);
  if (!document.ok) return fail(ctx.io, document.error);

  const catalog = await loadCatalog(ctx);
  if (typeof catalog === 'number') return catalog;

  const outputDir = resolve(ctx.io.cwd, args.output ?? dirname(specPath));
  const generated = new Map<string, Buffer>();
  const result = await buildGenerator(ctx, catalog).generate({
    document: document.value,
    preset: args.preset,
    outputDir,
    dryRun: true,
    initRepository: false,
    onWrite: (path, content) => generated.set(path, content),
  });
  if (!result.ok) return fail(ctx.io, result.error);

  printDiff(ctx.io, await diffProject({ root: outputDir, generated }), args.stat);
  for (const warning of result.value.report.warnings) {
    ctx.io.stderr(`${paint(ctx.io, YELLOW, 'warning:')} ${warning.message}`);
  }
  return 0;
}

async function runDoctor(ctx: CommandContext, args: DoctorArgs): Promise<number> {
  const catalog = await loadCatalog(ctx);
  if (typeof catalog === 'number') return catalog;

  const doctor = createDoctor({
    git: ctx.io.git ?? createGitRunner(),
    docker: ctx.io.docker ?? createCommandRunner('docker'),
    resolver: createConfigResolver({ catalog, logger: ctx.logger }),
    cwd: ctx.io.cwd,
    env: ctx.io.env,
    providersRoot: ctx.settings.providersRoot,
    logger: ctx.logger,
  });

  const report = await doctor.check(resolve(ctx.io.cwd, args.dir ?? '.'));
  printDoctorReport(ctx.io, report);
  return report.healthy ? 0 : 1;
}

async function runListTemplates(ctx: CommandContext): Promise<number> {
  const catalog = await loadCatalog(ctx);
  if (typeof catalog === 'number') return catalog;

  const templates = catalog.listTemplates();
  const width = Math.max(0, ...templates.map((t) => t.name.length));
  for (const template of templates) {
    const runtime = template.language ? ` (${template.language} ${template.langVersionDefault})` : '';
    ctx.io.stdout(`${template.name.padEnd(width)}  ${template.description}${runtime}`);
  }
  return 0;
}

async function runListPresets(ctx: CommandContext): Promise<number> {
  const catalog = await loadCatalog(ctx);
  if (typeof catalog === 'number') return catalog;

  const presets = catalog.listPresets();
  const width = Math.max(0, ...presets.map((p) => p.name.length));
  for (const preset of presets) {
    ctx.io.stdout(`${preset.name.padEnd(width)}  ${preset.description} (template: ${preset.template})`);
  }
  return 0;
}

async function runProviderEnv(ctx: CommandContext, args: ProviderEnvArgs): Promise<number> {
  const credentials = await loadProviderCredentials({
    markerPath: resolve(ctx.io.cwd, args.marker ?? PROVIDER_MARKER_PATH),
    providersRoot: ctx.settings.providersRoot,
    logger: ctx.logger,
  });
  if (!credentials.ok) return fail(ctx.io, credentials.error);

  const { env } = credentials.value;
  if (args.output) {
    const outputPath = resolve(ctx.io.cwd, args.output);
    await mkdir(dirname(outputPath), { recursive: true });
    const text = args.shell ? `${formatEnvExports(env)}\n` : formatEnvFile(env);
    await writeFile(outputPath, Object.keys(env).length > 0 ? text : '', { mode: 0o600 });
    // `mode` only applies when the file is created.
    await chmod(outputPath, 0o600);
    return 0;
  }

  const text = args.shell ? formatEnvExports(env) : formatEnvFile(env).trimEnd();
  if (text !== '') ctx.io.stdout(text);
  return 0;
}

// ─── Entry ──────────────────────────────────────────────────────

export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const args = parseCliArgs(argv);
  if (!args.ok) {
    const exitCode = fail(io, args.error);
    io.stderr(USAGE);
    return exitCode;
  }
  const command = args.value;
  if (command.command === 'help') {
    io.stdout(USAGE);
    return 0;
  }

  const settings = loadKilnSettings(io.env);
  if (!settings.ok) return fail(io, settings.error);

  const ctx: CommandContext = {
    io,
    settings: settings.value,
    logger: io.logger ?? createLogger({ level: settings.value.logLevel ?? 'warn', stderr: true }),
  };

  switch (command.command) {
    case 'init':
      return runInit(ctx, command);
    case 'generate':
      return runGenerate(ctx, command);
    case 'validate':
      return runValidate(ctx, command);
    case 'diff':
      return runDiff(ctx, command);
    case 'doctor':
      return runDoctor(ctx, command);
    case 'list-templates':
      return runListTemplates(ctx);
    case 'list-presets':
      return runListPresets(ctx);
    case 'provider-env':
      return runProviderEnv(ctx, command);
  }
}
