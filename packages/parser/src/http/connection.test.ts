import { describe, expect, it } from "vitest";
import { shouldKeepAlive } from "./connection.js";
import { HttpHeaders } from "./headers.js";
import type { HttpRequestHead, HttpVersion } from "./types.js";

function head(version: HttpVersion, connection?: string): HttpRequestHead {
  const headers = new HttpHeaders();
  if (connection !== undefined) headers.append("Connection", connection);
  return {
    method: "GET",
    target: "/",
    version,
    headers,
    framing: { type: "none" },
  };
}

describe("shouldKeepAlive", () => {
  it("keeps HTTP/1.1 connections open by default", () => {
    expect(shouldKeepAlive(head("HTTP/1.1"))).toBe(true);
    expect(shouldKeepAlive(head("HTTP/1.1", "Upgrade"))).toBe(true);
  });

  it("closes HTTP/1.1 on Connection: close", () => {
    expect(shouldKeepAlive(head("HTTP/1.1", "close"))).toBe(false);
    expect(shouldKeepAlive(head("HTTP/1.1", "Upgrade, Close"))).toBe(false);
  });

  it("closes HTTP/1.0 unless asked to keep alive", () => {
    expect(shouldKeepAlive(head("HTTP/1.0"))).toBe(false);
    expect(shouldKeepAlive(head("HTTP/1.0", "Keep-Alive"))).toBe(true);
  });
});
