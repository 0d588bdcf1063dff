import fetch from "node-fetch";
import type { z } from "zod";
import { DependencyUnavailableError } from "../errors.js";
import { describeZodError } from "../schemas.js";

export type Fetch = typeof fetch;

export type RemoteRequestOptions = {
  headers: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
  fetchFn?: Fetch;
};

/**
 * POSTs JSON and validates the reply. Every failure (network, timeout, non-2xx,
 * unexpected body) surfaces as DependencyUnavailableError; nothing is retried here.
 */
export async function postJson<S extends z.ZodTypeAny>(
  dependency: string,
  url: string,
  body: unknown,
  schema: S,
  opts: RemoteRequestOptions
): Promise<z.output<S>> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`timed out after ${opts.timeoutMs}ms`)), opts.timeoutMs);
  const onParentAbort = () => controller.abort(opts.signal?.reason);
  opts.signal?.addEventListener("abort", onParentAbort, { once: true });
  if (opts.signal?.aborted) controller.abort(opts.signal.reason);

  try {
    const res = await (opts.fetchFn ?? fetch)(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "application/json", ...opts.headers },
      body: JSON.stringify(body),
      signal: controller.signal
    });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`HTTP ${res.status}: ${text.slice(0, 200)}`);
    }
    const parsed: z.SafeParseReturnType<unknown, z.output<S>> = schema.safeParse(await res.json());
    if (!parsed.success) throw new Error(`unexpected response: ${describeZodError(parsed.error)}`);
    return parsed.data;
  } catch (err) {
    throw new DependencyUnavailableError(dependency, err);
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener("abort", onParentAbort);
  }
}
