import { Readable } from "node:stream";
import type { OAuth2Client } from "google-auth-library";
import { google, type drive_v3 } from "googleapis";

import { NetworkError } from "../application/errors";

const FOLDER_MIME = "application/vnd.google-apps.folder";
const FILE_FIELDS = "id,name,createdTime";

export type DriveFile = {
  id: string;
  name: string;
  createdTime: string;
};

/** Narrows a listing to one exact name, or to names starting with a prefix. */
export type DriveNameMatch = { name: string } | { prefix: string };

/**
 * The handful of Drive calls the data store needs. Everything is scoped to a
 * parent folder id.
 */
export interface DriveFileApi {
  findFolder(parentId: string, name: string): Promise<string | null>;
  createFolder(parentId: string, name: string): Promise<string>;
  /**
   * Files directly inside `parentId`. A prefix match may return extra files;
   * callers filter the names again.
   */
  listFiles(parentId: string, match?: DriveNameMatch): Promise<DriveFile[]>;
  createFile(parentId: string, name: string, data: Buffer): Promise<DriveFile>;
  updateFile(fileId: string, data: Buffer): Promise<void>;
  download(fileId: string): Promise<Buffer>;
  deleteFile(fileId: string): Promise<void>;
}

function escapeQueryValue(v: string) {
  // Google Drive query usa aspas simples; precisamos escapar ' dentro do name
  return v.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

function nameClause(match: DriveNameMatch | undefined): string | null {
  if (match === undefined) return null;
  if ("name" in match) return `name = '${escapeQueryValue(match.name)}'`;
  // Drive matches `contains` on names as a prefix
  return match.prefix === "" ? null : `name contains '${escapeQueryValue(match.prefix)}'`;
}

function httpStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("response" in err && typeof err.response === "object" && err.response !== null) {
    const res = err.response;
    if ("status" in res && typeof res.status === "number") return res.status;
  }
  return undefined;
}

const TRANSIENT_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "EAI_AGAIN", "ENOTFOUND"]);

/** Rate limits, server errors and dropped connections become retryable NetworkErrors. */
export function toDriveError(err: unknown, what: string): unknown {
  const status = httpStatus(err);
  if (status === 429 || (status !== undefined && status >= 500)) {
    return new NetworkError(`Google Drive ${what} failed with HTTP ${status}`, err);
  }
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    if (TRANSIENT_CODES.has(err.code)) {
      return new NetworkError(`Google Drive ${what} failed (${err.code})`, err);
    }
  }
  return err;
}

function toDriveFile(f: drive_v3.Schema$File): DriveFile | null {
  if (!f.id || !f.name) return null;
  return { id: f.id, name: f.name, createdTime: f.createdTime ?? "" };
}

export class GoogleDriveFiles implements DriveFileApi {
  private readonly drive: drive_v3.Drive;

  constructor(auth: OAuth2Client) {
    this.drive = google.drive({ version: "v3", auth });
  }

  private async call<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw toDriveError(err, what);
    }
  }

  async findFolder(parentId: string, name: string): Promise<string | null> {
    const q = [
      `'${escapeQueryValue(parentId)}' in parents`,
      `name = '${escapeQueryValue(name)}'`,
      `mimeType = '${FOLDER_MIME}'`,
      "trashed = false",
    ].join(" and ");

    const res = await this.call("folder lookup", () =>
      this.drive.files.list({ q, pageSize: 1, fields: "files(id)", spaces: "drive" })
    );
    return res.data.files?.[0]?.id ?? null;
  }

  async createFolder(parentId: string, name: string): Promise<string> {
    const res = await this.call("folder creation", () =>
      this.drive.files.create({
        requestBody: { name, mimeType: FOLDER_MIME, parents: [parentId] },
        fields: "id",
      })
    );
    const id = res.data.id;
    if (!id) throw new Error(`Google Drive did not return an id for folder "${name}"`);
    return id;
  }

  async listFiles(parentId: string, match?: DriveNameMatch): Promise<DriveFile[]> {
    const q = [
      `'${escapeQueryValue(parentId)}' in parents`,
      nameClause(match),
      `mimeType != '${FOLDER_MIME}'`,
      "trashed = false",
    ]
      .filter(Boolean)
      .join(" and ");

    const out: DriveFile[] = [];
    let pageToken: string | undefined;
    do {
      const res = await this.call("listing", () =>
        this.drive.files.list({
          q,
          pageSize: 1000,
          pageToken,
          fields: `nextPageToken,files(${FILE_FIELDS})`,
          spaces: "drive",
        })
      );
      for (const f of res.data.files ?? []) {
        const file = toDriveFile(f);
        if (file) out.push(file);
      }
      pageToken = res.data.nextPageToken ?? undefined;
    } while (pageToken);

    return out;
  }

  async createFile(parentId: string, name: string, data: Buffer): Promise<DriveFile> {
    const res = await this.call("upload", () =>
      this.drive.files.create({
        requestBody: { name, parents: [parentId] },
        media: { mimeType: "application/octet-stream", body: Readable.from([data]) },
        fields: FILE_FIELDS,
      })
    );
    const file = toDriveFile(res.data);
    if (!file) throw new Error(`Google Drive did not return an id for "${name}"`);
    return file;
  }

  async updateFile(fileId: string, data: Buffer): Promise<void> {
    await this.call("update", () =>
      this.drive.files.update({
        fileId,
        media: { mimeType: "application/octet-stream", body: Readable.from([data]) },
      })
    );
  }

  async download(fileId: string): Promise<Buffer> {
    const res = await this.call("download", () =>
      this.drive.files.get({ fileId, alt: "media" }, { responseType: "arraybuffer" })
    );
    const data: unknown = res.data;
    if (data instanceof ArrayBuffer) return Buffer.from(data);
    if (Buffer.isBuffer(data)) return data;
    if (typeof data === "string") return Buffer.from(data, "utf-8");
    throw new Error(`Unexpected Google Drive download payload for file ${fileId}`);
  }

  async deleteFile(fileId: string): Promise<void> {
    await this.call("delete", () => this.drive.files.delete({ fileId }));
  }
}

/** Walks (and creates where missing) a folder path below `My Drive`. */
export async function ensureFolderPath(api: DriveFileApi, segments: readonly string[]): Promise<string> {
  let parentId = "root";
  for (const name of segments) {
    parentId = (await api.findFolder(parentId, name)) ?? (await api.createFolder(parentId, name));
  }
  return parentId;
}
