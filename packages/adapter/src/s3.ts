import { GetObjectCommand, ListObjectsV2Command, S3Client } from "@aws-sdk/client-s3";
import { AdapterError, type Result } from "@loadstone/core";
import { wrapAsync } from "./shared";
import type { ObjectInfo, ObjectStore, ObjectStoreConfig } from "./types";

/**
 * S3 object store.
 *
 * Wraps the AWS S3 SDK to provide a Result-based, read-only view of one
 * bucket. All public methods return `Result` and never throw.
 */
export class S3ObjectStore implements ObjectStore {
	/** @internal */
	readonly client: S3Client;
	readonly bucket: string;

	constructor(config: ObjectStoreConfig) {
		this.bucket = config.bucket;
		this.client = new S3Client({
			endpoint: config.endpoint,
			region: config.region ?? "us-east-1",
			credentials: config.credentials,
			// S3-compatible services behind a custom endpoint rarely support virtual-host addressing
			forcePathStyle: config.endpoint !== undefined,
		});
	}

	/** List objects under a prefix across every result page */
	async listObjects(prefix: string): Promise<Result<ObjectInfo[], AdapterError>> {
		return wrapAsync(async () => {
			const objects: ObjectInfo[] = [];
			let continuationToken: string | undefined;

			do {
				const response = await this.client.send(
					new ListObjectsV2Command({
						Bucket: this.bucket,
						Prefix: prefix,
						ContinuationToken: continuationToken,
					}),
				);
				for (const item of response.Contents ?? []) {
					if (item.Key === undefined) continue;
					objects.push({
						key: item.Key,
						size: item.Size ?? 0,
						lastModified: item.LastModified ?? new Date(0),
					});
				}
				continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
			} while (continuationToken !== undefined);

			return objects;
		}, `Failed to list objects with prefix: ${prefix}`);
	}

	/** Retrieve an object from the bucket */
	async getObject(key: string): Promise<Result<Uint8Array, AdapterError>> {
		return wrapAsync(async () => {
			const response = await this.client.send(
				new GetObjectCommand({
					Bucket: this.bucket,
					Key: key,
				}),
			);
			const bytes = await response.Body?.transformToByteArray();
			if (!bytes) {
				throw new AdapterError(`Empty response for object: ${key}`);
			}
			return bytes;
		}, `Failed to get object: ${key}`);
	}
}
