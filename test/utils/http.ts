import { AxiosHeaders, AxiosResponse } from 'axios';

export function axiosResponse<T>(data: T, status = 200): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: String(status),
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

/** Text of a file part in a multipart body handed to the fake HttpService. */
export async function formFieldText(body: unknown, field: string): Promise<string> {
  if (!(body instanceof FormData)) {
    throw new Error('Expected a FormData request body');
  }
  const entry = body.get(field);
  if (!(entry instanceof Blob)) {
    throw new Error(`Expected "${field}" to be a file part`);
  }
  return entry.text();
}

export async function waitUntil(
  predicate: () => boolean,
  timeoutMs = 2000,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
