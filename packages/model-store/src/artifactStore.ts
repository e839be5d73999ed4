/**
 * Artifact stores for the classifier bundle: a local directory or a Supabase Storage
 * bucket. Both return null for a missing artifact and throw on any other failure.
 */

import { readFile } from "fs/promises";
import { join, resolve } from "path";
import type { ArtifactStore } from "interaction-core";

export class FileArtifactStore implements ArtifactStore {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = resolve(dir);
  }

  async read(name: string): Promise<string | null> {
    try {
      return await readFile(join(this.dir, name), "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    }
  }

  describe(): string {
    return this.dir;
  }
}

/** The slice of a Supabase Storage bucket API used here. */
export interface StorageBucket {
  download(path: string): PromiseLike<{ data: Blob | null; error: { message: string } | null }>;
}

function isNotFound(message: string): boolean {
  return /not found|does not exist|404/i.test(message);
}

export class SupabaseArtifactStore implements ArtifactStore {
  constructor(
    private readonly bucket: StorageBucket,
    private readonly bucketName: string,
    private readonly prefix = ""
  ) {}

  private path(name: string): string {
    return this.prefix ? `${this.prefix.replace(/\/+$/, "")}/${name}` : name;
  }

  async read(name: string): Promise<string | null> {
    const { data, error } = await this.bucket.download(this.path(name));
    if (error) {
      if (isNotFound(error.message)) return null;
      throw new Error(`storage ${this.bucketName}/${this.path(name)}: ${error.message}`);
    }
    return data ? data.text() : null;
  }

  describe(): string {
    return `supabase://${this.bucketName}${this.prefix ? `/${this.prefix}` : ""}`;
  }
}
