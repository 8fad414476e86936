// pattern: Unit Test
import { describe, expect, it } from "vitest";

import createRenderer, { formatLogLine } from "./renderer.js";

describe("formatLogLine", () => {
  const plain = { colorize: false };

  it("should render info lines with extra fields", () => {
    const line = JSON.stringify({
      level: 30,
      time: 1700000000000,
      pid: 42,
      hostname: "box",
      name: "pkgprobe",
      msg: "Diagnosing package",
      package: "six",
    });

    expect(formatLogLine(line, plain)).toBe(
      '> Diagnosing package {"package":"six"}'
    );
  });

  it("should render error lines with message and stack", () => {
    const line = JSON.stringify({
      level: 50,
      msg: "Diagnosis failed",
      err: { message: "boom", stack: ["at probe (probe.ts:1:1)"] },
    });

    expect(formatLogLine(line, plain)).toBe(
      "E Diagnosis failed\n    boom\n        at probe (probe.ts:1:1)"
    );
  });

  it("should pass through lines that are not pino JSON", () => {
    expect(formatLogLine("not json", plain)).toBe("not json");
    expect(formatLogLine('{"hello":"world"}', plain)).toBe('{"hello":"world"}');
  });
});

describe("createRenderer", () => {
  it("should transform each non-empty line", async () => {
    const renderer = createRenderer({ colorize: false });
    const chunks: string[] = [];
    renderer.on("data", (chunk: Buffer) => chunks.push(chunk.toString()));

    const done = new Promise<void>(resolve => renderer.on("end", resolve));
    renderer.write(
      `${JSON.stringify({ level: 40, msg: "careful" })}\n\n${JSON.stringify({ level: 20, msg: "detail" })}\n`
    );
    renderer.end();
    await done;

    expect(chunks.join("")).toBe("W careful\n= detail\n");
  });
});
