export interface ReleaseAsset {
  name: string;
  browserDownloadUrl: string;
}

export interface ReleaseRecord {
  tagName: string;
  assets: ReleaseAsset[];
}

/**
 * A downloadable artifact for one release and platform. Used once per install attempt.
 */
export interface ReleaseArtifact {
  tagName: string;
  assetName: string;
  downloadUrl: string;
  checksumsUrl?: string;
}

export type LocateResult =
  | { status: 'found'; artifact: ReleaseArtifact }
  | { status: 'release-not-found'; tagName: string }
  | { status: 'platform-unsupported'; tagName: string; assetName: string };

export interface DownloadProgress {
  bytesDownloaded: number;
  /** null when the server sent no Content-Length */
  totalBytes: number | null;
}

export type DownloadProgressCallback = (progress: DownloadProgress) => void;
