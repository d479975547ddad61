import { vi } from "vitest";

export function createTestLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    critical: vi.fn()
  };
}

export function buildFetchResponse(params: {
  status: number;
  statusText?: string;
  body: string;
}) {
  return {
    ok: params.status >= 200 && params.status < 300,
    status: params.status,
    statusText: params.statusText ?? "OK",
    text: async () => params.body
  };
}
