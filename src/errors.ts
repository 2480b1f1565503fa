import axios from 'axios';
import type { SkipReason } from './types/sync.js';

export type ServiceName = 'harvest' | 'timing';

export type CatalogStage = 'clients' | 'projects' | 'tasks' | 'timing-projects' | 'timing-time-entries';

export class ApiRequestError extends Error {
  constructor(
    readonly service: ServiceName,
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

export class AuthError extends Error {
  constructor(readonly service: ServiceName, detail: string) {
    super(`${service === 'harvest' ? 'Harvest' : 'Timing'} rejected the personal access token (${detail}). Check the token and account id.`);
    this.name = 'AuthError';
  }
}

export class CatalogFetchError extends Error {
  constructor(readonly stage: CatalogStage, cause: unknown) {
    super(`Failed to load catalog (${stage}): ${describeError(cause)}`, { cause });
    this.name = 'CatalogFetchError';
  }
}

export class AssociationError extends Error {
  constructor(readonly reason: SkipReason, message: string) {
    super(message);
    this.name = 'AssociationError';
  }
}

export class RemoteWriteError extends Error {
  constructor(readonly operation: 'create' | 'update', cause: unknown) {
    super(`Failed to ${operation} Harvest time entry: ${describeError(cause)}`, { cause });
    this.name = 'RemoteWriteError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function apiMessage(data: unknown): string | undefined {
  if (typeof data === 'string' && data.length > 0) {
    return data;
  }
  if (typeof data === 'object' && data !== null) {
    if ('message' in data && typeof data.message === 'string') {
      return data.message;
    }
    if ('error_description' in data && typeof data.error_description === 'string') {
      return data.error_description;
    }
    return JSON.stringify(data);
  }
  return undefined;
}

/**
 * Turns an axios failure into an AuthError (401) or an ApiRequestError that
 * carries the API's own error message when it sent one.
 */
export function toApiError(service: ServiceName, action: string, error: unknown): Error {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 401) {
      return new AuthError(service, `HTTP 401 while trying to ${action}`);
    }
    const details = apiMessage(error.response?.data) ?? error.message;
    return new ApiRequestError(service, `Failed to ${action}: ${details}`, status);
  }
  return error instanceof Error ? error : new Error(String(error));
}
