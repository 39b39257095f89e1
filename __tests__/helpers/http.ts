import { ReadableStream } from "node:stream/web";
import { vi } from "vitest";
import type { FetchLike } from "../../src/connectors/sailthru/client.js";

export function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

/** A response whose body arrives in the given chunks. */
export function chunkedResponse(chunks: string[], status = 200): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      controller.close();
    },
  });
  return new Response(body, { status });
}

/** A response whose body sends the given chunks, then fails. */
export function brokenResponse(chunks: string[], error: Error): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      controller.error(error);
    },
  });
  return new Response(body, { status: 200 });
}

export function fakeFetch(...responses: Array<Response | Error>) {
  const fetchImpl = vi.fn<FetchLike>();
  for (const response of responses) {
    if (response instanceof Error) fetchImpl.mockRejectedValueOnce(response);
    else fetchImpl.mockResolvedValueOnce(response);
  }
  return fetchImpl;
}

/** Sleeping advances the clock instead of waiting. */
export function fakeClock(start = 0) {
  let current = start;
  const sleep = vi.fn(async (ms: number) => {
    current += ms;
  });
  return { now: () => current, sleep };
}

export function requestUrl(input: unknown): URL {
  if (typeof input === "string") return new URL(input);
  if (input instanceof URL) return input;
  throw new Error("unexpected fetch input");
}
