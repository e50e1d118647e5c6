export type OrderId = string;

export type ImageReference = Readonly<{
  url: string; // absolute, as found on the listing page
  extension: string; // lowercase, with the leading dot
}>;

export type TransformConfig = {
  removeWidthHeight: boolean;
  removeWatermark: boolean;
  extraParamsToRemove: readonly string[];
};

export type TaskStatus = 'pending' | 'in-flight' | 'retrying' | 'succeeded' | 'failed';

export type DownloadTask = {
  readonly reference: ImageReference;
  readonly sourceUrl: string; // after transformUrl
  readonly targetPath: string;
  attempts: number;
  status: TaskStatus;
  error?: unknown;
};

// skipped: already on disk; cancelled: never started because the run was stopped
export type DownloadOutcome = 'succeeded' | 'skipped' | 'failed' | 'cancelled';

export type DownloadResult = Readonly<{
  task: Readonly<DownloadTask>;
  outcome: DownloadOutcome;
  error?: string;
}>;

export type ProgressCallback = (completed: number, total: number) => void;

export type RunStatus = 'success' | 'partial' | 'fatal';

export type RunSummary = {
  orderId: OrderId;
  pageUrl: string;
  status: RunStatus;
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
  cancelled: number;
  results: DownloadResult[];
  error?: string; // set when status is 'fatal'
};
