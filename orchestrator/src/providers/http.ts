import { GenerationFailedError, errorMessageOf } from '../errors.js';

export type FetchLike = typeof fetch;

export interface JsonResponse {
  status: number;
  ok: boolean;
  body: unknown;
  text: string;
}

export async function requestJson(
  fetchImpl: FetchLike,
  url: string,
  init: { method: 'GET' | 'POST'; headers: Record<string, string>; body?: unknown },
  provider: string
): Promise<JsonResponse> {
  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: init.method,
      headers: init.body === undefined ? init.headers : { 'Content-Type': 'application/json', ...init.headers },
      body: init.body === undefined ? undefined : JSON.stringify(init.body)
    });
  } catch (error) {
    throw new GenerationFailedError(`Network error: ${errorMessageOf(error)}`, provider);
  }

  const text = await response.text();
  let body: unknown = undefined;
  if (text.length > 0) {
    try {
      body = JSON.parse(text);
    } catch {
      // non-JSON bodies are reported through `text`
    }
  }

  return { status: response.status, ok: response.ok, body, text };
}

function errorField(body: unknown, field: 'message' | 'status'): string | undefined {
  if (typeof body !== 'object' || body === null || !('error' in body)) {
    return undefined;
  }
  const error = body.error;
  if (typeof error !== 'object' || error === null || !(field in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

export function apiErrorMessage(response: JsonResponse): string {
  return errorField(response.body, 'message') ?? (response.text.trim() || `HTTP ${response.status}`);
}

export function isNotFound(response: JsonResponse): boolean {
  return response.status === 404 || errorField(response.body, 'status') === 'NOT_FOUND';
}
