import { AppError } from '../../shared/errors';

export type PlatformFetchFailure = {
  endpoint: string;
  assetUid?: string;
  status?: number;
  timedOut?: boolean;
  cause?: string;
};

export class PlatformFetchError extends AppError {
  readonly endpoint: string;
  readonly assetUid?: string;

  constructor(message: string, failure: PlatformFetchFailure) {
    super(message, failure.timedOut ? 504 : 502, failure);
    this.endpoint = failure.endpoint;
    this.assetUid = failure.assetUid;
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}
