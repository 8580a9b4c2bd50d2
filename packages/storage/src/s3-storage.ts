import {
  GetObjectCommand,
  ListObjectsV2Command,
  S3Client,
  paginateListObjectsV2,
} from "@aws-sdk/client-s3";
import type { StorageConfig } from "@ragline/types";
import { StorageError, toErrorMessage } from "@ragline/errors";
import type { IDocumentStorage } from "./document-storage.interface.js";

function createClient(config: StorageConfig): S3Client {
  const credentials =
    config.accessKeyId && config.secretAccessKey
      ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
      : undefined;

  return new S3Client({
    region: config.region,
    credentials,
    // Custom endpoints (MinIO, LocalStack) generally need path-style addressing
    ...(config.endpoint ? { endpoint: config.endpoint, forcePathStyle: true } : {}),
  });
}

/**
 * S3-compatible document storage. Without explicit keys the SDK's default
 * credential chain applies.
 */
export class S3DocumentStorage implements IDocumentStorage {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly basePrefix: string;
  private readonly suffixes: string[];

  constructor(config: StorageConfig, client?: S3Client) {
    this.client = client ?? createClient(config);
    this.bucket = config.bucket;
    this.basePrefix = config.prefix;
    this.suffixes = config.documentSuffixes.map((s) => s.toLowerCase());
  }

  async list(prefix = ""): Promise<string[]> {
    const fullPrefix = this.basePrefix + prefix;
    const keys: string[] = [];

    try {
      const pages = paginateListObjectsV2(
        { client: this.client },
        { Bucket: this.bucket, Prefix: fullPrefix },
      );
      for await (const page of pages) {
        for (const object of page.Contents ?? []) {
          if (object.Key && this.isDocument(object.Key)) {
            keys.push(object.Key);
          }
        }
      }
    } catch (err) {
      throw new StorageError(
        `Failed to list documents in ${this.bucket}/${fullPrefix}: ${toErrorMessage(err)}`,
        { cause: err },
      );
    }

    return keys;
  }

  async fetch(key: string): Promise<Uint8Array> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!response.Body) {
        throw new StorageError(`Object ${key} has no body`);
      }
      return await response.Body.transformToByteArray();
    } catch (err) {
      if (err instanceof StorageError) throw err;
      throw new StorageError(`Failed to download ${key}: ${toErrorMessage(err)}`, {
        cause: err,
        details: { key },
      });
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.send(
        new ListObjectsV2Command({ Bucket: this.bucket, Prefix: this.basePrefix, MaxKeys: 1 }),
      );
      return true;
    } catch {
      return false;
    }
  }

  private isDocument(key: string): boolean {
    const lower = key.toLowerCase();
    return this.suffixes.some((suffix) => lower.endsWith(suffix));
  }
}
