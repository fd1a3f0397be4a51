import { describe, it, expect } from "vitest";

import { KeyNotFoundError, NetworkError } from "../application/errors";
import { GoogleDriveDataStore } from "./google-drive-data-store";
import { toDriveError, type DriveFile, type DriveFileApi, type DriveNameMatch } from "./google-drive-files";

type StoredFile = DriveFile & { parentId: string; data: Buffer };

class FakeDriveApi implements DriveFileApi {
  readonly files: StoredFile[] = [];
  readonly listings: Array<DriveNameMatch | undefined> = [];
  /** Files handed back by listings, summed over every call. */
  scanned = 0;
  /** Listings still to answer as if the folder were empty. */
  staleListings = 0;
  /** Creation time given to every file, when set. */
  createdTime?: string;
  private counter = 0;
  beforeCreate?: (name: string) => void;

  async findFolder(): Promise<string | null> {
    return null;
  }

  async createFolder(_parentId: string, name: string): Promise<string> {
    return `folder-${name}`;
  }

  async listFiles(parentId: string, match?: DriveNameMatch): Promise<DriveFile[]> {
    this.listings.push(match);
    if (this.staleListings > 0) {
      this.staleListings -= 1;
      return [];
    }
    const found = this.files
      .filter((f) => f.parentId === parentId)
      .filter((f) => {
        if (match === undefined) return true;
        return "name" in match ? f.name === match.name : f.name.startsWith(match.prefix);
      })
      .map(({ id, name, createdTime }) => ({ id, name, createdTime }));
    this.scanned += found.length;
    return found;
  }

  addFile(parentId: string, name: string, data: Buffer, createdTime?: string): StoredFile {
    this.counter += 1;
    const file: StoredFile = {
      id: `file-${this.counter}`,
      name,
      parentId,
      data: Buffer.from(data),
      createdTime: createdTime ?? this.createdTime ?? new Date(Date.UTC(2024, 0, 1, 0, 0, this.counter)).toISOString(),
    };
    this.files.push(file);
    return file;
  }

  async createFile(parentId: string, name: string, data: Buffer): Promise<DriveFile> {
    this.beforeCreate?.(name);
    const { id, createdTime } = this.addFile(parentId, name, data);
    return { id, name, createdTime };
  }

  async updateFile(fileId: string, data: Buffer): Promise<void> {
    const file = this.files.find((f) => f.id === fileId);
    if (file) file.data = Buffer.from(data);
  }

  async download(fileId: string): Promise<Buffer> {
    const file = this.files.find((f) => f.id === fileId);
    if (!file) throw new Error(`no file ${fileId}`);
    return Buffer.from(file.data);
  }

  async deleteFile(fileId: string): Promise<void> {
    const idx = this.files.findIndex((f) => f.id === fileId);
    if (idx !== -1) this.files.splice(idx, 1);
  }
}

describe("GoogleDriveDataStore", () => {
  it("stores keys as files in its folder", async () => {
    const api = new FakeDriveApi();
    const store = new GoogleDriveDataStore(api, "root");

    await store.put("home/content/ab/cd/abcd", Buffer.from("one"));
    await store.put("home/content/ab/cd/abcd", Buffer.from("two"));
    await expect(store.putIfAbsent("home/changesets/000000000000.json", Buffer.from("{}"))).resolves.toBe(true);

    expect((await store.get("home/content/ab/cd/abcd")).toString()).toBe("two");
    await expect(store.list("home/")).resolves.toEqual([
      "home/changesets/000000000000.json",
      "home/content/ab/cd/abcd",
    ]);
    expect(api.files).toHaveLength(2);
    expect(store.description).toBe("gdrive://root");
  });

  it("reports a missing key", async () => {
    const store = new GoogleDriveDataStore(new FakeDriveApi(), "root");
    await expect(store.get("home/x")).rejects.toThrow(KeyNotFoundError);
  });

  it("refuses to publish over an existing key", async () => {
    const api = new FakeDriveApi();
    const store = new GoogleDriveDataStore(api, "root");
    api.addFile("root", "home/k", Buffer.from("first"));

    await expect(store.putIfAbsent("home/k", Buffer.from("second"))).resolves.toBe(false);
    expect((await store.get("home/k")).toString()).toBe("first");
  });

  it("backs out when a rival created the same key earlier", async () => {
    const api = new FakeDriveApi();
    const store = new GoogleDriveDataStore(api, "root");
    api.beforeCreate = (name) => {
      api.addFile("root", name, Buffer.from("rival"), "2023-12-31T23:59:59.000Z");
    };

    await expect(store.putIfAbsent("home/k", Buffer.from("mine"))).resolves.toBe(false);
    expect(api.files.map((f) => f.data.toString())).toEqual(["rival"]);
    expect((await store.get("home/k")).toString()).toBe("rival");
  });

  it("lets the first of two writers with the same creation time keep the key", async () => {
    const api = new FakeDriveApi();
    api.createdTime = "2024-01-01T00:00:00.000Z";
    const first = new GoogleDriveDataStore(api, "root");
    const second = new GoogleDriveDataStore(api, "root");

    await expect(first.putIfAbsent("home/k", Buffer.from("first"))).resolves.toBe(true);
    // the second writer's existence check ran before the first file was visible
    api.staleListings = 1;
    await expect(second.putIfAbsent("home/k", Buffer.from("second"))).resolves.toBe(false);

    expect(api.files.map((f) => f.data.toString())).toEqual(["first"]);
  });

  it("looks keys up by exact name and lists by name prefix", async () => {
    const api = new FakeDriveApi();
    const store = new GoogleDriveDataStore(api, "root");
    for (let i = 0; i < 50; i++) api.addFile("root", `home/content/${i}`, Buffer.from(String(i)));
    api.addFile("root", "home/changesets/000000000000.json", Buffer.from("{}"));

    await expect(store.exists("home/content/7")).resolves.toBe(true);
    await expect(store.exists("home/content/x")).resolves.toBe(false);
    await expect(store.list("home/changesets/")).resolves.toEqual(["home/changesets/000000000000.json"]);

    expect(api.listings).toEqual([
      { name: "home/content/7" },
      { name: "home/content/x" },
      { prefix: "home/changesets/" },
    ]);
    expect(api.scanned).toBe(2);
  });

  it("deletes every file carrying a key", async () => {
    const api = new FakeDriveApi();
    api.addFile("root", "home/k", Buffer.from("a"));
    api.addFile("root", "home/k", Buffer.from("b"));
    await new GoogleDriveDataStore(api, "root").delete("home/k");
    expect(api.files).toEqual([]);
  });
});

describe("toDriveError", () => {
  it("turns rate limits and server errors into NetworkError", () => {
    const limited = toDriveError({ response: { status: 429 } }, "list");
    expect(limited).toBeInstanceOf(NetworkError);
    expect(limited instanceof Error && limited.message).toBe("Google Drive list failed with HTTP 429");
    expect(toDriveError({ status: 503 }, "get")).toBeInstanceOf(NetworkError);
    expect(toDriveError({ code: "ECONNRESET" }, "get")).toBeInstanceOf(NetworkError);
  });

  it("passes other errors through", () => {
    const notFound = { response: { status: 404 } };
    expect(toDriveError(notFound, "get")).toBe(notFound);
  });
});
