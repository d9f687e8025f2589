/**
 * Типизированные ошибки поиска.
 * Каждая ошибка знает свой статус для внешнего ответа и то,
 * можно ли повторить запрос в более простом режиме.
 */
import { errors as esErrors } from '@elastic/elasticsearch';

// Статус неуспешного ответа поиска.
export type FailureStatus =
  | 'bad-request'
  | 'not-found'
  | 'service-unavailable'
  | 'cancelled'
  | 'internal';

export type SearchErrorKind =
  | 'validation'
  | 'connectivity'
  | 'authentication'
  | 'not-found'
  | 'timeout'
  | 'embedding-unavailable'
  | 'cancelled';

// Базовый класс ошибок поиска.
export abstract class SearchError extends Error {
  abstract readonly kind: SearchErrorKind;
  abstract readonly status: FailureStatus;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class ValidationError extends SearchError {
  readonly kind = 'validation';
  readonly status = 'bad-request';
}

export class ConnectivityError extends SearchError {
  readonly kind = 'connectivity';
  readonly status = 'service-unavailable';
  override readonly retryable = true;

  constructor(message = 'Search index is unreachable', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class AuthenticationError extends SearchError {
  readonly kind = 'authentication';
  readonly status = 'service-unavailable';

  constructor(message = 'Search index rejected the credentials', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class NotFoundError extends SearchError {
  readonly kind = 'not-found';
  readonly status = 'not-found';
}

export class TimeoutError extends SearchError {
  readonly kind = 'timeout';
  readonly status = 'service-unavailable';
  override readonly retryable = true;

  constructor(message = 'Search index did not respond in time', options?: { cause?: unknown }) {
    super(message, options);
  }
}

// Эмбеддинг недоступен. Наружу не выходит: запрос уходит в enhanced.
export class EmbeddingUnavailableError extends SearchError {
  readonly kind = 'embedding-unavailable';
  readonly status = 'service-unavailable';
}

export class RequestCancelledError extends SearchError {
  readonly kind = 'cancelled';
  readonly status = 'cancelled';

  constructor(message = 'Search request was cancelled', options?: { cause?: unknown }) {
    super(message, options);
  }
}

// Неуспешный ответ поиска.
export interface SearchFailure {
  error: string;
  results: [];
  total: 0;
  status: FailureStatus;
}

export function isSearchError(error: unknown): error is SearchError {
  return error instanceof SearchError;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Переводит ошибку клиента Elasticsearch в таксономию поиска.
 * Неизвестные ошибки возвращаются без изменений.
 */
export function classifyIndexError(error: unknown): unknown {
  if (isSearchError(error)) {
    return error;
  }

  if (error instanceof esErrors.RequestAbortedError || isAbortError(error)) {
    return new RequestCancelledError(undefined, { cause: error });
  }

  if (error instanceof esErrors.TimeoutError) {
    return new TimeoutError(undefined, { cause: error });
  }

  if (error instanceof esErrors.ConnectionError || error instanceof esErrors.NoLivingConnectionsError) {
    return new ConnectivityError(undefined, { cause: error });
  }

  if (error instanceof esErrors.ResponseError) {
    const statusCode = error.statusCode ?? 0;

    if (statusCode === 401 || statusCode === 403) {
      return new AuthenticationError(undefined, { cause: error });
    }
    if (statusCode === 404) {
      return new NotFoundError(`Search index not found: ${error.message}`, { cause: error });
    }
    if (statusCode === 408 || statusCode === 504) {
      return new TimeoutError(undefined, { cause: error });
    }
    if (statusCode === 429 || statusCode === 502 || statusCode === 503) {
      return new ConnectivityError(`Search index is unavailable (HTTP ${statusCode})`, { cause: error });
    }
  }

  return error;
}

/**
 * Ответ об ошибке для внешней границы. Непредвиденные ошибки логируются
 * целиком, наружу уходит только общее сообщение.
 */
export function toSearchFailure(error: unknown): SearchFailure {
  const classified = classifyIndexError(error);

  if (isSearchError(classified)) {
    return { error: classified.message, results: [], total: 0, status: classified.status };
  }

  console.error('[search] Unexpected error:', classified);
  return { error: 'Internal search error', results: [], total: 0, status: 'internal' };
}
