import type { DataStore } from "../ports/data-store";
import { assertSafeKey } from "../application/backup-layout";
import { KeyNotFoundError, NetworkError } from "../application/errors";
import type { DriveFile, DriveFileApi } from "./google-drive-files";

const PUBLISH_ATTEMPTS = 3;

function byCreation(a: DriveFile, b: DriveFile): number {
  if (a.createdTime !== b.createdTime) return a.createdTime < b.createdTime ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * DataStore over one Drive folder; every key is a file named after the key.
 *
 * Drive has no create-if-absent. `putIfAbsent` creates its file and keeps it
 * only when every other file carrying the name is strictly newer. Creation
 * times that tie cannot be ordered, so the later caller backs out; when all
 * rivals backed out the key is absent again and the publish is retried.
 */
export class GoogleDriveDataStore implements DataStore {
  constructor(
    private readonly api: DriveFileApi,
    private readonly rootFolderId: string,
    readonly description = `gdrive://${rootFolderId}`
  ) {}

  private async filesNamed(key: string): Promise<DriveFile[]> {
    assertSafeKey(key);
    const files = await this.api.listFiles(this.rootFolderId, { name: key });
    return files.filter((f) => f.name === key).sort(byCreation);
  }

  async put(key: string, data: Buffer): Promise<void> {
    const [current] = await this.filesNamed(key);
    if (current) await this.api.updateFile(current.id, data);
    else await this.api.createFile(this.rootFolderId, key, data);
  }

  async putIfAbsent(key: string, data: Buffer): Promise<boolean> {
    for (let attempt = 0; attempt < PUBLISH_ATTEMPTS; attempt++) {
      if ((await this.filesNamed(key)).length > 0) return false;

      const created = await this.api.createFile(this.rootFolderId, key, data);
      const rivals = (await this.filesNamed(key)).filter((f) => f.id !== created.id);
      if (rivals.every((f) => f.createdTime > created.createdTime)) return true;
      await this.api.deleteFile(created.id);
    }
    throw new NetworkError(`Google Drive publish of "${key}" kept colliding with other writers`);
  }

  async get(key: string): Promise<Buffer> {
    const [file] = await this.filesNamed(key);
    if (!file) throw new KeyNotFoundError(key);
    return this.api.download(file.id);
  }

  async exists(key: string): Promise<boolean> {
    return (await this.filesNamed(key)).length > 0;
  }

  async list(prefix: string): Promise<string[]> {
    const files = await this.api.listFiles(this.rootFolderId, { prefix });
    const names = new Set(files.map((f) => f.name).filter((n) => n.startsWith(prefix)));
    return [...names].sort();
  }

  async delete(key: string): Promise<void> {
    for (const file of await this.filesNamed(key)) {
      await this.api.deleteFile(file.id);
    }
  }
}
