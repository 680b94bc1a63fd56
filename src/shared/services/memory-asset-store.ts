import { AssetStore } from "./storage-manager.js";
import { StorageError } from "../utils/errors.js";

type StoredAsset = { bytes: Buffer; contentType: string; };

/** Asset store held in process memory. */
export class InMemoryAssetStore implements AssetStore {
  private readonly objects = new Map<string, StoredAsset>();

  async put(key: string, bytes: Buffer, contentType: string): Promise<string> {
    this.objects.set(key, { bytes: Buffer.from(bytes), contentType });
    return key;
  }

  async get(key: string): Promise<Buffer> {
    const stored = this.objects.get(key);
    if (!stored) {
      throw new StorageError(`No object stored at ${key}`);
    }
    return Buffer.from(stored.bytes);
  }

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  contentType(key: string): string | undefined {
    return this.objects.get(key)?.contentType;
  }

  keys(): string[] {
    return [ ...this.objects.keys() ].sort();
  }
}
