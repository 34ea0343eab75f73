import { AdapterError, type Result } from "@loadstone/core";
import { type drive_v3, google } from "googleapis";
import { wrapAsync } from "./shared";
import type { DownloadProgress, FileDownloadSource, FileMetadata } from "./types";

const DRIVE_READONLY_SCOPE = "https://www.googleapis.com/auth/drive.readonly";

/** Options for the Drive download source */
export interface DriveConfig {
	/** Service account key file; Application Default Credentials are used when omitted */
	keyFile?: string;
}

/**
 * Google Drive file source.
 *
 * Downloads file content by id through the Drive v3 API, streaming the
 * body so progress can be reported as chunks arrive.
 */
export class DriveDownloadSource implements FileDownloadSource {
	/** @internal */
	readonly drive: drive_v3.Drive;

	constructor(config: DriveConfig = {}) {
		const auth = new google.auth.GoogleAuth({
			keyFile: config.keyFile,
			scopes: [DRIVE_READONLY_SCOPE],
		});
		this.drive = google.drive({ version: "v3", auth });
	}

	async getMetadata(fileId: string): Promise<Result<FileMetadata, AdapterError>> {
		return wrapAsync(async () => {
			const response = await this.drive.files.get({
				fileId,
				fields: "id,name,mimeType",
				supportsAllDrives: true,
			});
			return {
				id: response.data.id ?? fileId,
				name: response.data.name ?? "unknown_file",
				mimeType: response.data.mimeType ?? undefined,
			};
		}, `Failed to read metadata for file ${fileId}`);
	}

	async download(
		fileId: string,
		onProgress?: (progress: DownloadProgress) => void,
	): Promise<Result<Uint8Array, AdapterError>> {
		return wrapAsync(async () => {
			const response = await this.drive.files.get(
				{ fileId, alt: "media", supportsAllDrives: true },
				{ responseType: "stream" },
			);
			const length = Number(response.headers["content-length"]);
			const totalBytes = Number.isFinite(length) && length > 0 ? length : undefined;

			const chunks: Uint8Array[] = [];
			let bytesReceived = 0;
			for await (const chunk of response.data) {
				if (!(chunk instanceof Uint8Array)) {
					throw new AdapterError(`Unexpected chunk type while downloading file ${fileId}`);
				}
				chunks.push(chunk);
				bytesReceived += chunk.byteLength;
				onProgress?.({ bytesReceived, totalBytes });
			}

			const bytes = new Uint8Array(bytesReceived);
			let offset = 0;
			for (const chunk of chunks) {
				bytes.set(chunk, offset);
				offset += chunk.byteLength;
			}
			return bytes;
		}, `Failed to download file ${fileId}`);
	}
}
