import { AxiosError } from "axios";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { classifyHttpError } from "../../src/adapters/http";
import { MalformedPayloadError, TransientSourceError } from "../../src/common/errors";
import { fakeHttp, utf8, windows1250 } from "../support/http";

const pageSchema = z.object({ value: z.array(z.number()) });

describe("HttpSource", () => {
  it("returns validated JSON", async () => {
    const { http, requests } = fakeHttp("FROST", () => ({ data: { value: [1, 2] } }));
    await expect(http.getJson("Datastreams", pageSchema)).resolves.toEqual({ value: [1, 2] });
    expect(requests).toEqual(["Datastreams"]);
  });

  it("passes query parameters through", async () => {
    const { http } = fakeHttp("FROST", (_url, config) => ({ data: { value: [config.params.top] } }));
    await expect(http.getJson("Datastreams", pageSchema, { top: 5 })).resolves.toEqual({
      value: [5],
    });
  });

  it("rejects bodies of the wrong shape as malformed", async () => {
    const { http } = fakeHttp("FROST", () => ({ data: { value: ["x"] } }));
    const failure = http.getJson("Datastreams", pageSchema);
    await expect(failure).rejects.toBeInstanceOf(MalformedPayloadError);
    await expect(failure).rejects.toThrow(
      "Unexpected response shape from FROST: value.0: Expected number, received string"
    );
  });

  it("maps server errors to transient failures", async () => {
    const { http } = fakeHttp("FROST", () => ({ status: 503 }));
    const failure = http.getJson("Datastreams", pageSchema);
    await expect(failure).rejects.toBeInstanceOf(TransientSourceError);
    await expect(failure).rejects.toThrow("Request to FROST failed: Request failed with status code 503");
  });

  it("maps client errors to malformed requests", async () => {
    const { http } = fakeHttp("FROST", () => ({ status: 404 }));
    await expect(http.getJson("Datastreams", pageSchema)).rejects.toThrow(
      "Request to FROST rejected: Request failed with status code 404"
    );
  });

  it("decodes text in the requested charset", async () => {
    const { http } = fakeHttp("LANUV", () => ({ data: windows1250("Köln;Düren") }));
    await expect(http.getText("table.csv", "windows-1250")).resolves.toBe("Köln;Düren");
  });

  it("yields null for a missing text document", async () => {
    const { http } = fakeHttp("SensorCommunity", (url) =>
      url.endsWith("known.csv") ? { data: utf8("a;b") } : { status: 404 }
    );
    await expect(http.getTextIfPresent("https://archive.example/known.csv")).resolves.toBe("a;b");
    await expect(http.getTextIfPresent("https://archive.example/gone.csv")).resolves.toBeNull();
  });

  it("still fails a missing-tolerant read on server errors", async () => {
    const { http } = fakeHttp("SensorCommunity", () => ({ status: 502 }));
    await expect(http.getTextIfPresent("day.csv")).rejects.toBeInstanceOf(TransientSourceError);
  });
});

describe("classifyHttpError", () => {
  it("retries network failures and rate limits", () => {
    expect(classifyHttpError("S", "/x", new AxiosError("connect ECONNREFUSED", "ECONNREFUSED"))).toBeInstanceOf(
      TransientSourceError
    );
    expect(classifyHttpError("S", "/x", new AxiosError("timeout of 60000ms exceeded", "ECONNABORTED"))).toBeInstanceOf(
      TransientSourceError
    );
    expect(classifyHttpError("S", "/x", new Error("socket hang up"))).toBeInstanceOf(
      TransientSourceError
    );
  });

  it("keeps request context on the error", () => {
    const error = classifyHttpError("S", "/x", new AxiosError("bad", "ERR_BAD_REQUEST"));
    expect(error).toBeInstanceOf(MalformedPayloadError);
    expect(error).toMatchObject({
      context: { source: "S", url: "/x", status: null, code: "ERR_BAD_REQUEST" },
    });
  });
});
