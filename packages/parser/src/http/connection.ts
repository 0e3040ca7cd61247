import type { HttpRequestHead } from "./types.js";

function connectionOptions(head: HttpRequestHead): string[] {
  return head.headers
    .getAll("connection")
    .flatMap((value) => value.split(","))
    .map((option) => option.trim().toLowerCase());
}

/** Whether the connection may carry another request after this one. */
export function shouldKeepAlive(head: HttpRequestHead): boolean {
  const options = connectionOptions(head);
  if (head.version === "HTTP/1.0") {
    return options.includes("keep-alive");
  }
  return !options.includes("close");
}
