import path from "path";
import { z } from "zod";
import {
  BackupService,
  compilePatterns,
  ConsoleLogger,
  createPathFilter,
  DataStoreChangeSetStore,
  DataStoreContentStore,
  DataStoreFactory,
  defaultStoreRetryPolicy,
  expandHome,
  FileRunLock,
  manifestsDir,
  MirrorService,
  NodeManifestCache,
  parseDestination,
  ReplayEngine,
  sleep,
  type ConsoleSink,
  type DataStore,
  type Logger,
  type PathFilter,
  type RetryPolicy,
  type Sleeper,
} from "@offsite/core-application";

import { ConfigLoader, type OffsiteConfig } from "./config";

export type CliIo = {
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Command results (stdout). Logs go through the logger. */
  out: (line: string) => void;
  logSink: ConsoleSink;
  setExitCode: (code: number) => void;
  sleeper?: Sleeper;
};

export const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  timeout: z.coerce.number().int().nonnegative().optional(),
  verbose: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export type CliContext = {
  io: CliIo;
  config: OffsiteConfig;
  stateDir: string;
  logger: Logger;
  retryPolicy: RetryPolicy;
  sleeper: Sleeper;
  stores: DataStoreFactory;
};

export function createContext(io: CliIo, rawOptions: unknown): CliContext {
  const globals = GlobalOptionsSchema.parse(rawOptions);
  const { config } = new ConfigLoader({ cwd: io.cwd, env: io.env, configPath: globals.config }).load();

  // CLI flags win over file and env
  const effective: OffsiteConfig = {
    ...config,
    concurrency: globals.concurrency ?? config.concurrency,
    storeTimeoutMs: globals.timeout ?? config.storeTimeoutMs,
    logLevel: globals.verbose ? "debug" : config.logLevel,
  };

  const logger = new ConsoleLogger(effective.logLevel, io.logSink);
  const stateDir = path.resolve(io.cwd, expandHome(effective.stateDir));
  const retryPolicy = defaultStoreRetryPolicy(effective.retry);

  return {
    io,
    config: effective,
    stateDir,
    logger,
    retryPolicy,
    sleeper: io.sleeper ?? sleep,
    stores: new DataStoreFactory({ timeoutMs: effective.storeTimeoutMs, stateDir, logger }),
  };
}

export async function openStore(ctx: CliContext, destination: string): Promise<DataStore> {
  return ctx.stores.open(parseDestination(destination, ctx.io.cwd));
}

export function pathFilter(ctx: CliContext, extra: { includes?: string[]; excludes?: string[] } = {}): PathFilter {
  return createPathFilter({
    includes: compilePatterns([...ctx.config.includes, ...(extra.includes ?? [])]),
    excludes: compilePatterns([...ctx.config.excludes, ...(extra.excludes ?? [])]),
  });
}

export function backupParts(ctx: CliContext, store: DataStore, backupName: string) {
  const storeDeps = { retryPolicy: ctx.retryPolicy, sleeper: ctx.sleeper, logger: ctx.logger };
  const changeSets = new DataStoreChangeSetStore(store, backupName, storeDeps);
  const content = new DataStoreContentStore(store, backupName, storeDeps);
  const engine = new ReplayEngine({ changeSets, content, logger: ctx.logger });
  return { changeSets, content, engine };
}

export function createBackupService(ctx: CliContext, store: DataStore): BackupService {
  return new BackupService({
    store,
    manifestCache: new NodeManifestCache(manifestsDir(ctx.stateDir, store.description), {
      logger: ctx.logger,
    }),
    runLock: new FileRunLock(ctx.stateDir),
    logger: ctx.logger,
    concurrency: ctx.config.concurrency,
    retryPolicy: ctx.retryPolicy,
    sleeper: ctx.sleeper,
  });
}

/** Mirror runs are recorded per target directory. */
export function createMirrorService(ctx: CliContext, targetRoot: string): MirrorService {
  return new MirrorService({
    logger: ctx.logger,
    concurrency: ctx.config.concurrency,
    records: new NodeManifestCache(manifestsDir(ctx.stateDir, `mirror://${targetRoot}`), { logger: ctx.logger }),
  });
}
