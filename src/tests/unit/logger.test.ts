import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { Logger, LogMeta, createLogger, maskContact, redactMeta, withLogContext } from "../../config/logger";

function captureLines(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = [];
  return { lines, write: (line) => lines.push(line) };
}

describe("createLogger", () => {
  it("writes one JSON line per entry at or above the minimum level", () => {
    const { lines, write } = captureLines();
    const logger = createLogger({
      minLevel: "info",
      scope: "screening",
      write,
      now: () => new Date("2026-01-01T00:00:00.000Z"),
    });

    logger.debug("hidden");
    logger.info("Screening finished", { candidates: 3 });
    logger.error("Storage failed", {});

    assert.equal(lines.length, 2);
    assert.ok(lines.every((line) => line.endsWith("\n")));
    assert.deepEqual(JSON.parse(lines[0]), {
      timestamp: "2026-01-01T00:00:00.000Z",
      level: "info",
      message: "Screening finished",
      scope: "screening",
      meta: { candidates: 3 },
    });
    assert.deepEqual(JSON.parse(lines[1]), {
      timestamp: "2026-01-01T00:00:00.000Z",
      level: "error",
      message: "Storage failed",
      scope: "screening",
    });
  });
});

describe("redactMeta", () => {
  it("replaces secrets, masks contact fields and shortens long strings", () => {
    assert.deepEqual(
      redactMeta({
        apiKey: "test-secret",
        access_token: "test-secret",
        tokenEstimate: 12,
        serviceRoleKey: "test-secret",
        candidate_email: "avery@example.test",
        phone: "12",
        note: "x".repeat(501),
        score: 0.5,
      }),
      {
        apiKey: "[REDACTED]",
        access_token: "[REDACTED]",
        tokenEstimate: 12,
        serviceRoleKey: "[REDACTED]",
        candidate_email: "a***st",
        phone: "***",
        note: `${"x".repeat(500)}...`,
        score: 0.5,
      },
    );
  });

  it("leaves absent contact values untouched", () => {
    assert.deepEqual(redactMeta({ email: null, phone: "" }), { email: null, phone: "" });
    assert.equal(maskContact("  +1 555 0100  "), "+***00");
  });
});

describe("withLogContext", () => {
  it("merges fixed fields under the caller's meta", () => {
    const seen: Array<{ message: string; meta?: LogMeta }> = [];
    const base: Logger = {
      debug: (message, meta) => seen.push({ message, meta }),
      info: (message, meta) => seen.push({ message, meta }),
      warn: (message, meta) => seen.push({ message, meta }),
      error: (message, meta) => seen.push({ message, meta }),
    };
    const logger = withLogContext(base, { component: "auditor", run: 1 });

    logger.warn("Flag raised", { run: 2 });
    logger.info("Done");

    assert.deepEqual(seen, [
      { message: "Flag raised", meta: { component: "auditor", run: 2 } },
      { message: "Done", meta: { component: "auditor", run: 1 } },
    ]);
  });
});
