// packages/cli/src/commands.ts
import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";

import Database from "better-sqlite3";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import type { DestinationStream, Logger } from "pino";

import { ConfigError, errorMessage, HydrocheckError } from "../../model/src/index.js";
import { checkProject, loadProject, rulePathsFor } from "../../pipeline/src/index.js";
import { exitCodeFor, renderMarkdown, renderTerminalSummary, serializeReport, SqliteReportArchive } from "../../report/src/index.js";
import { loadRuleDocuments } from "../../rules/src/index.js";

import { LOG_LEVELS, loadConfig, type CliConfig, type ConfigOverrides, type LogLevel } from "./config.js";
import { createLogger, progressLogger } from "./logger.js";
import { renderModelSummary } from "./summary.js";

export const TOOL = { name: "hydrocheck", version: "0.4.0" } as const;

/** 0 clean, 1 violation failures, 2 usage, configuration or fatal input errors. */
export type ExitCode = 0 | 1 | 2;

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  cwd: string;
  env: Readonly<Record<string, string | undefined>>;
  /** Log sink; stderr when absent. */
  logDestination?: DestinationStream;
  now?: () => Date;
};

export function processIo(): CliIo {
  return {
    stdout: (t) => process.stdout.write(t),
    stderr: (t) => process.stderr.write(t),
    cwd: process.cwd(),
    env: process.env,
  };
}

interface SharedOptions {
  readonly config?: string;
  readonly rules?: string[];
  readonly state?: string;
  readonly bundled?: boolean;
  readonly strict?: boolean;
  readonly readTimeout?: number;
  readonly logLevel?: LogLevel;
  readonly prettyLogs?: boolean;
}

interface RunOptions extends SharedOptions {
  readonly json?: string;
  readonly markdown?: string;
  readonly archive?: string;
}

interface ArchiveOptions {
  readonly verify?: boolean;
  readonly project?: string;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("expected a positive whole number of milliseconds");
  return n;
}

function withSharedOptions(cmd: Command, options: { rules: boolean; input: boolean }): Command {
  cmd.option("-c, --config <file>", "config file (default: nearest .hydrocheckrc.yaml)");
  if (options.rules) {
    cmd
      .option("-r, --rules <files...>", "extra rule documents, loaded after the bundled ones")
      .option("-s, --state <name>", "bundled state overlay (e.g. TX, texas, ME)")
      .option("--no-bundled", "do not load the bundled rule sets");
  }
  if (options.input) {
    cmd
      .option("--strict", "treat unknown keywords, malformed numbers and unterminated sections as errors")
      .option("--read-timeout <ms>", "per-file read timeout", positiveInt);
  }
  return cmd
    .addOption(new Option("--log-level <level>", "log level").choices(LOG_LEVELS))
    .option("--pretty-logs", "human-readable logs on stderr");
}

function overridesFrom(opts: SharedOptions, cmd: Command): ConfigOverrides {
  return {
    ...(opts.rules !== undefined ? { rules: opts.rules } : {}),
    ...(opts.state !== undefined ? { state: opts.state } : {}),
    // --no-bundled defaults to true; only an explicit flag overrides the config.
    ...(cmd.getOptionValueSource("bundled") === "cli" ? { bundled: opts.bundled } : {}),
    ...(opts.strict !== undefined ? { strict: opts.strict } : {}),
    ...(opts.readTimeout !== undefined ? { readTimeoutMs: opts.readTimeout } : {}),
    ...(opts.logLevel !== undefined ? { logLevel: opts.logLevel } : {}),
    ...(opts.prettyLogs !== undefined ? { prettyLogs: opts.prettyLogs } : {}),
  };
}

type Context = { config: CliConfig; logger: Logger };

export function createProgram(io: CliIo, setExit: (code: ExitCode) => void): Command {
  const context = (opts: SharedOptions, cmd: Command, extra: ConfigOverrides = {}): Context => {
    const config = loadConfig({
      cwd: io.cwd,
      env: io.env,
      ...(opts.config !== undefined ? { configPath: opts.config } : {}),
      overrides: { ...overridesFrom(opts, cmd), ...extra },
    });
    const logger = createLogger({
      level: config.logLevel,
      pretty: config.prettyLogs,
      ...(io.logDestination ? { destination: io.logDestination } : {}),
    });
    if (config.source) logger.debug({ config: config.source }, "config file read");
    return { config, logger };
  };

  const writeOutput = async (target: string, content: string): Promise<void> => {
    if (target === "-") io.stdout(content.endsWith("\n") ? content : `${content}\n`);
    else await writeFile(resolve(io.cwd, target), content, "utf8");
  };

  const program = new Command()
    .name(TOOL.name)
    .description("Check river hydraulic model projects against regulatory rules")
    .version(TOOL.version)
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  withSharedOptions(
    program
      .command("run")
      .description("evaluate a project against the rule sets and report")
      .argument("<project>", "project file (.prj)")
      .option("--json <file>", 'write the JSON report ("-" for stdout)')
      .option("--markdown <file>", 'write the Markdown report ("-" for stdout)')
      .option("--archive <db>", "store the report in a SQLite archive"),
    { rules: true, input: true }
  ).action(async (project: string, opts: RunOptions, cmd: Command) => {
    const { config, logger } = context(opts, cmd, opts.archive !== undefined ? { archive: opts.archive } : {});
    const { report } = await checkProject(resolve(io.cwd, project), {
      tool: TOOL,
      rulePaths: config.rules,
      state: config.state,
      bundled: config.bundled,
      strict: config.strict,
      readTimeoutMs: config.readTimeoutMs,
      onProgress: progressLogger(logger),
      ...(io.now ? { now: io.now } : {}),
    });
    for (const e of report.rule_errors) logger.error({ rule_id: e.rule_id, source: e.source }, e.reason);

    if (opts.json !== undefined) await writeOutput(opts.json, serializeReport(report));
    if (opts.markdown !== undefined) await writeOutput(opts.markdown, renderMarkdown(report));
    if (config.archive !== null) {
      const db = new Database(config.archive);
      try {
        const stored = new SqliteReportArchive(db).store(report);
        logger.info({ archive: config.archive, ...stored }, "report archived");
      } finally {
        db.close();
      }
    }
    if (opts.json !== "-" && opts.markdown !== "-") io.stdout(`${renderTerminalSummary(report)}\n`);
    setExit(exitCodeFor(report));
  });

  withSharedOptions(
    program.command("list-rules").description("list the rules that would be evaluated, in load order"),
    { rules: true, input: false }
  ).action(async (opts: SharedOptions, cmd: Command) => {
    const { config } = context(opts, cmd);
    const paths = rulePathsFor({ rulePaths: config.rules, state: config.state, bundled: config.bundled });
    const set = await loadRuleDocuments(paths, { readTimeoutMs: config.readTimeoutMs });

    const width = Math.max(12, ...set.rules.map((r) => r.spec.id.length));
    const lines = set.rules.map((r) => `  ${r.spec.id.padEnd(width)}  ${`[${r.spec.severity}]`.padEnd(11)}  ${r.spec.name}`);
    const docs = set.identity.documents.map((d) => `${d.id} ${d.version}`).join(", ");
    io.stdout([`Rule sets: ${docs || "(none)"}`, ...lines, "", `  ${set.rules.length} rules total`, ""].join("\n"));

    for (const w of set.warnings) io.stderr(`warning: ${w}\n`);
    for (const e of set.errors) io.stderr(`error: ${e.message}\n`);
    setExit(set.errors.length > 0 ? 2 : 0);
  });

  withSharedOptions(
    program
      .command("summary")
      .description("summarize a project without evaluating rules")
      .argument("<project>", "project file (.prj)"),
    { rules: false, input: true }
  ).action(async (project: string, opts: SharedOptions, cmd: Command) => {
    const { config, logger } = context(opts, cmd);
    const loaded = await loadProject(resolve(io.cwd, project), {
      strict: config.strict,
      readTimeoutMs: config.readTimeoutMs,
      onProgress: progressLogger(logger),
    });
    io.stdout(`${renderModelSummary(loaded)}\n`);
    setExit(0);
  });

  program
    .command("archive")
    .description("list or verify archived reports")
    .argument("<db>", "SQLite archive")
    .option("--verify", "re-hash every stored report")
    .option("--project <name>", "only reports of this project file")
    .action((dbPath: string, opts: ArchiveOptions) => {
      const db = new Database(resolve(io.cwd, dbPath), { fileMustExist: true });
      try {
        const archive = new SqliteReportArchive(db);
        for (const e of archive.list(opts.project)) {
          io.stdout(`${e.archived_at}  ${e.report_hash.slice(0, 12)}  ${e.project}  exit ${e.exit_code}  ${e.fail_count}/${e.finding_count} failed\n`);
        }
        if (!opts.verify) {
          setExit(0);
          return;
        }
        const failures = archive.verifyAll();
        for (const f of failures) io.stderr(`${f.code}: ${f.report_hash} ${f.message}\n`);
        setExit(failures.length > 0 ? 1 : 0);
      } finally {
        db.close();
      }
    });

  return program;
}

/** Parse and run one command line; never throws for expected failures. */
export async function runCli(argv: readonly string[], io: CliIo): Promise<ExitCode> {
  let code: ExitCode = 0;
  const program = createProgram(io, (c) => {
    code = c;
  });
  try {
    await program.parseAsync([...argv], { from: "user" });
    return code;
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode === 0 ? 0 : 2;
    if (e instanceof ConfigError) {
      io.stderr(`hydrocheck: configuration error: ${e.message}\n`);
      return 2;
    }
    if (e instanceof HydrocheckError) {
      io.stderr(`hydrocheck: ${e.code}: ${e.message}\n`);
      return 2;
    }
    io.stderr(`hydrocheck: ${errorMessage(e)}\n`);
    return 2;
  }
}
