import { describe, expect, it } from "vitest";
import { loggerTargets } from "../logger.js";

describe("loggerTargets", () => {
  it("keeps stderr at warn and writes info to the log file by default", () => {
    const { level, targets } = loggerTargets({ logDir: "/tmp/outpost-logs", env: {} });

    expect(level).toBe("info");
    expect(targets).toEqual([
      { target: "pino/file", level: "warn", options: { destination: 2 } },
      { target: "pino/file", level: "info", options: { destination: "/tmp/outpost-logs/agent.log", mkdir: true } },
    ]);
  });

  it("pretty-prints debug logs to stderr when verbose", () => {
    const { level, targets } = loggerTargets({ verbose: true, logDir: "/tmp/outpost-logs", env: {} });

    expect(level).toBe("debug");
    expect(targets[0]).toMatchObject({ target: "pino-pretty", level: "debug", options: { destination: 2 } });
    expect(targets[1].level).toBe("debug");
  });

  it("takes the level from LOG_LEVEL", () => {
    const { level, targets } = loggerTargets({ logDir: "/tmp/outpost-logs", env: { LOG_LEVEL: "trace" } });

    expect(level).toBe("trace");
    expect(targets[0].target).toBe("pino-pretty");
  });
});
