export interface JsonResponse {
  ok: boolean;
  status: number;
  body: unknown;
}

/**
 * Fetches a URL and reads its JSON body under one timeout, using AbortController.
 * A `parentSignal` (the checkout deadline) aborts the call as well.
 *
 * @throws Error with name 'AbortError' when the timeout or the parent signal fires
 */
export async function fetchJsonWithTimeout(
  url: string,
  options: RequestInit,
  timeoutMs: number,
  parentSignal?: AbortSignal,
): Promise<JsonResponse> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onParentAbort = (): void => controller.abort();

  if (parentSignal?.aborted) {
    controller.abort();
  } else {
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });
  }

  try {
    const response = await fetch(url, {
      ...options,
      signal: controller.signal,
    });
    const body = await parseJson(response);

    return { ok: response.ok, status: response.status, body };
  } finally {
    clearTimeout(timeoutId);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}

export async function parseJson(response: Pick<Response, 'text'>): Promise<unknown> {
  const text = await response.text();

  if (text.trim() === '') {
    return {};
  }

  try {
    return JSON.parse(text) as unknown;
  } catch {
    return { raw: text };
  }
}
