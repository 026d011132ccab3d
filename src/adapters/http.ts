import axios, { type AxiosInstance } from "axios";
import type { z } from "zod";
import { MalformedPayloadError, TransientSourceError, describeError } from "../common/errors";

// no response at all: refused, reset, DNS, timeout
const TRANSIENT_CODES = new Set([
  "ECONNABORTED",
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EPIPE",
  "ERR_NETWORK",
]);

export interface HttpSourceOptions {
  source: string;
  baseURL?: string;
  timeoutMs?: number;
  auth?: { username: string; password: string };
  client?: AxiosInstance;
}

/** Maps a failed request onto the transient/malformed split the retry policy understands. */
export function classifyHttpError(source: string, url: string, err: unknown): Error {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const transient =
      status === undefined
        ? err.code === undefined || TRANSIENT_CODES.has(err.code)
        : status >= 500 || status === 429;
    const context = { source, url, status: status ?? null, code: err.code ?? null };
    return transient
      ? new TransientSourceError(`Request to ${source} failed: ${err.message}`, context, {
          cause: err,
        })
      : new MalformedPayloadError(`Request to ${source} rejected: ${err.message}`, context, {
          cause: err,
        });
  }
  return new TransientSourceError(
    `Request to ${source} failed: ${describeError(err)}`,
    { source, url },
    { cause: err }
  );
}

export class HttpSource {
  readonly source: string;
  private readonly client: AxiosInstance;

  constructor(options: HttpSourceOptions) {
    this.source = options.source;
    this.client =
      options.client ??
      axios.create({
        baseURL: options.baseURL,
        timeout: options.timeoutMs ?? 30_000,
        auth: options.auth,
        headers: { Accept: "application/json" },
      });
  }

  /** GET a JSON document and validate its shape; absolute URLs bypass the base URL. */
  async getJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params?: Record<string, string | number>
  ): Promise<T> {
    let data: unknown;
    try {
      const response = await this.client.get<unknown>(url, { params, responseType: "json" });
      data = response.data;
    } catch (err) {
      throw classifyHttpError(this.source, url, err);
    }
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new MalformedPayloadError(
        `Unexpected response shape from ${this.source}: ${parsed.error.issues
          .slice(0, 3)
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; ")}`,
        { source: this.source, url }
      );
    }
    return parsed.data;
  }

  /** Like getText, but a document the server does not have yields null. */
  async getTextIfPresent(url: string, encoding = "utf-8"): Promise<string | null> {
    try {
      return await this.getText(url, encoding);
    } catch (err) {
      if (err instanceof MalformedPayloadError && err.context.status === 404) return null;
      throw err;
    }
  }

  /** GET a text document decoded with the given charset. */
  async getText(url: string, encoding = "utf-8"): Promise<string> {
    const decoder = new TextDecoder(encoding);
    try {
      const response = await this.client.get<ArrayBuffer>(url, { responseType: "arraybuffer" });
      return decoder.decode(response.data);
    } catch (err) {
      throw classifyHttpError(this.source, url, err);
    }
  }
}
