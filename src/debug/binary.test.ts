import { describe, it, expect, vi, afterEach } from "vitest";
import { formatBinary, logBinary } from "./binary";
import { createLogger, setLogLevel } from "../log";

afterEach(() => {
  setLogLevel("warn");
  vi.restoreAllMocks();
});

describe("formatBinary", () => {
  it("groups bits in nibbles from the right", () => {
    expect(formatBinary(0)).toBe("0");
    expect(formatBinary(10)).toBe("1010");
    expect(formatBinary(255)).toBe("1111 1111");
    expect(formatBinary(65546)).toBe("1 0000 0000 0000 1010");
  });

  it("formats bigints", () => {
    expect(formatBinary(1n << 62n)).toBe("100" + " 0000".repeat(15));
  });

  it("prefixes negative values with a minus sign", () => {
    expect(formatBinary(-5)).toBe("-101");
  });
});

describe("logBinary", () => {
  it("logs at debug level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    setLogLevel("debug");

    logBinary(createLogger("test"), 10, "ten");

    expect(debug).toHaveBeenCalledWith("[test] ten: 1010");
  });

  it("stays quiet above debug level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    logBinary(createLogger("test"), 10);

    expect(debug).not.toHaveBeenCalled();
  });
});
