import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { DEFAULT_PROGRAMS_FILE } from "lanrelay-shared/config";
import { InternalError, NotFoundError } from "lanrelay-shared/errors";
import { findProgram, loadPrograms } from "../programs.js";

let tmpDir: string;
let file: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-programs-"));
  file = path.join(tmpDir, "programs.json");
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("loadPrograms", () => {
  it("returns an empty list when the file does not exist", () => {
    expect(loadPrograms(file)).toEqual([]);
  });

  it("fills in default args and description", () => {
    fs.writeFileSync(file, JSON.stringify({ programs: [{ name: "uptime", path: "/usr/bin/uptime" }] }));
    expect(loadPrograms(file)).toEqual([{ name: "uptime", path: "/usr/bin/uptime", args: [], description: "" }]);
  });

  it("rejects malformed JSON", () => {
    fs.writeFileSync(file, "{ programs: ");
    expect(() => loadPrograms(file)).toThrow(InternalError);
    expect(() => loadPrograms(file)).toThrow("Program catalogue is unreadable");
  });

  it("rejects entries without a path", () => {
    fs.writeFileSync(file, JSON.stringify({ programs: [{ name: "broken" }] }));
    expect(() => loadPrograms(file)).toThrow("Program catalogue is invalid");
  });

  it("re-reads the file on every call", () => {
    fs.writeFileSync(file, JSON.stringify({ programs: [] }));
    expect(loadPrograms(file)).toHaveLength(0);
    fs.writeFileSync(file, JSON.stringify({ programs: [{ name: "a", path: "a" }] }));
    expect(loadPrograms(file)).toHaveLength(1);
  });

  it("accepts the shipped catalogue", () => {
    expect(loadPrograms(DEFAULT_PROGRAMS_FILE).map((p) => p.name)).toEqual(["uptime", "disk_usage", "notepad"]);
  });
});

describe("findProgram", () => {
  it("finds an entry by exact name", () => {
    fs.writeFileSync(file, JSON.stringify({ programs: [{ name: "disk", path: "df", args: ["-h"] }] }));
    expect(findProgram(file, "disk").args).toEqual(["-h"]);
  });

  it("throws NotFoundError for other names", () => {
    fs.writeFileSync(file, JSON.stringify({ programs: [{ name: "disk", path: "df" }] }));
    expect(() => findProgram(file, "Disk")).toThrow(NotFoundError);
    expect(() => findProgram(file, "Disk")).toThrow("Program 'Disk' not found");
  });
});
