import fs from "node:fs/promises";
import path from "node:path";
import SftpClient from "ssh2-sftp-client";

import type { DataStore } from "../ports/data-store";
import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import type { Destination, DestinationScheme } from "../application/destination";
import { describeDestination } from "../application/destination";
import { ConfigError, UnsupportedDestinationError } from "../application/errors";
import { expandHome } from "../infra/home";
import { FileSystemDataStore } from "./file-system-data-store";
import { GoogleAuth } from "./google-auth";
import { GoogleDriveDataStore } from "./google-drive-data-store";
import { ensureFolderPath, GoogleDriveFiles } from "./google-drive-files";
import { MemoryDataStore } from "./memory-data-store";
import { SftpDataStore, toSftpError } from "./sftp-data-store";
import { TimedDataStore } from "./timed-data-store";

export type DataStoreContext = {
  stateDir: string;
  logger: Logger;
};

export type DataStoreOpener = (
  destination: Destination,
  ctx: DataStoreContext
) => DataStore | Promise<DataStore>;

const openFile: DataStoreOpener = (destination) => new FileSystemDataStore(destination.location);

const openMemory: DataStoreOpener = (destination) => MemoryDataStore.named(destination.location);

const openDrive: DataStoreOpener = async (destination, ctx) => {
  const credentials = destination.options["credentials"];
  if (!credentials) {
    throw new ConfigError(
      `Destination ${describeDestination(destination)} needs ?credentials=<OAuth client file>`
    );
  }
  const tokens = destination.options["tokens"] ?? path.join(ctx.stateDir, "google");

  const auth = new GoogleAuth({
    credentialsPathAbs: path.resolve(expandHome(credentials)),
    tokenDirAbs: path.resolve(expandHome(tokens)),
    logger: ctx.logger,
  });
  const api = new GoogleDriveFiles(await auth.getAuthorizedClient());
  const folderId = await ensureFolderPath(api, destination.location.split("/"));
  return new GoogleDriveDataStore(api, folderId, describeDestination(destination));
};

const openSftp: DataStoreOpener = async (destination, ctx) => {
  const { host, port, username, password, privateKeyPath } = destination.options;
  if (password === undefined && privateKeyPath === undefined) {
    throw new ConfigError(
      `Destination ${describeDestination(destination)} needs a password or ?privateKeyPath=<key file>`
    );
  }
  const privateKey =
    privateKeyPath === undefined ? undefined : await fs.readFile(path.resolve(expandHome(privateKeyPath)));

  const client = new SftpClient();
  try {
    await client.connect({ host, port: Number(port), username, password, privateKey });
  } catch (err) {
    throw toSftpError(err, `connect to ${host ?? ""}`);
  }
  ctx.logger.debug("sftp connected", { host, port, username });
  return new SftpDataStore(client, destination.location, describeDestination(destination));
};

/** Maps destination schemes to the adapters that open them. */
export class DataStoreFactory {
  private readonly openers = new Map<DestinationScheme, DataStoreOpener>([
    ["file", openFile],
    ["memory", openMemory],
    ["gdrive", openDrive],
    ["sftp", openSftp],
  ]);

  constructor(private readonly options: { timeoutMs: number; stateDir: string; logger?: Logger }) {}

  register(scheme: DestinationScheme, opener: DataStoreOpener): this {
    this.openers.set(scheme, opener);
    return this;
  }

  async open(destination: Destination): Promise<DataStore> {
    const opener = this.openers.get(destination.scheme);
    if (!opener) throw new UnsupportedDestinationError(destination.scheme);

    const logger = this.options.logger ?? silentLogger;
    const store = await opener(destination, { stateDir: this.options.stateDir, logger });
    logger.debug("data store opened", { destination: store.description });
    return new TimedDataStore(store, this.options.timeoutMs);
  }
}
