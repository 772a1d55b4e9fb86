import { describe, test, expect, beforeEach } from "vitest";
import { run, type CliDeps } from "./cli";
import {
  createMockClock,
  createMockContext,
  createMockFileSystem,
  createMockLogger,
  createMockShellExecutor,
} from "#/test-utils/mocks";
import { createFakeGit, type FakeGit } from "#/test-utils/fake-git";

const RELEASE_YAML = `
signingIdentity: release@example.com
locations:
  - { name: package, path: package.json, strategy: json }
  - { name: chart, path: chart.yaml, strategy: yaml }
targets:
  docs:
    root: /srv/docs
    build: [docs-build, "{output}"]
    output: .release/build/docs
  package:
    index: pypi
    build: [pkg-build, "{output}"]
    output: ".release/build/demo-{version}.tar.gz"
    upload: [pkg-upload, "{artifact}"]
`;

describe("cli", () => {
  let git: FakeGit;
  let out: string[];
  let err: string[];
  let deps: CliDeps;
  let docsFailure: string | null;

  beforeEach(() => {
    const fs = createMockFileSystem({
      "/project/release.yaml": RELEASE_YAML,
      "/project/package.json": '{\n  "name": "demo",\n  "version": "1.3.2"\n}\n',
      "/project/chart.yaml": "name: demo\nversion: 1.3.2\n",
    });
    const tools = createMockShellExecutor({
      "docs-build": ([output]) => {
        if (docsFailure) throw new Error(docsFailure);
        fs.writeFile(`${output}/index.html`, "docs");
        return "";
      },
      "pkg-build": ([output]) => {
        fs.writeFile(output ?? "", "sdist");
        return "";
      },
    });
    git = createFakeGit(fs, { root: "/project", tracked: ["package.json", "chart.yaml"], fallback: tools });
    out = [];
    err = [];
    docsFailure = null;
    deps = {
      cwd: "/project",
      fs,
      createContext: (paths) =>
        createMockContext({ fs, shell: git, logger: createMockLogger(), clock: createMockClock(), paths }),
      out: (line) => out.push(line),
      err: (line) => err.push(line),
    };
  });

  test("status lists releases and location versions", () => {
    expect(run(["status"], deps)).toBe(0);

    expect(out).toEqual(["No releases", "Locations on main:", "  package  1.3.2", "  chart  1.3.2"]);
  });

  test("start runs a release to the end", () => {
    expect(run(["start", "--bump", "minor"], deps)).toBe(0);
    expect(out).toEqual(["Release 1.4.0 is at Closed"]);

    out.length = 0;
    run(["status"], deps);
    expect(out).toEqual([
      "1.4.0  Closed  archived  release-1.4.0",
      "Locations on main:",
      "  package  1.4.0",
      "  chart  1.4.0",
    ]);
  });

  test("a failed stage prints the stage and error and exits non-zero", () => {
    git.signingError = "gpg: signing failed: No secret key";

    expect(run(["start", "--release-version", "1.4.0"], deps)).toBe(1);

    expect(err).toEqual([
      "Release 1.4.0 failed at Tagged",
      "[SigningFailed] Signing tag v1.4.0 as release@example.com failed: gpg: signing failed: No secret key",
    ]);
  });

  test("a failure after an irreversible stage asks for resume", () => {
    docsFailure = "sphinx: config error";

    expect(run(["start", "--bump", "minor"], deps)).toBe(1);

    expect(err).toEqual([
      "Release 1.4.0 failed at DocsPublished",
      "[BuildFailed] docs build for 1.4.0 failed: sphinx: config error",
      "Tagged cannot be undone; fix the cause and run: resume 1.4.0",
    ]);
  });

  test("status of one release prints its history", () => {
    run(["start", "--bump", "minor"], deps);
    out.length = 0;

    expect(run(["status", "1.4.0"], deps)).toBe(0);

    expect(out).toHaveLength(8);
    expect(out[0]).toBe("1.4.0  Closed  archived  release-1.4.0");
    expect(out[1]).toMatch(/^ {2}Frozen {2}\S+ {2}release branch created from mainline$/);
    expect(out[7]).toMatch(/^ {2}Closed {2}\S+ {2}record archived$/);
  });

  test("resume continues a failed release", () => {
    git.signingError = "gpg: signing failed: No secret key";
    run(["start", "--bump", "minor"], deps);
    git.signingError = null;

    expect(run(["resume", "1.4.0"], deps)).toBe(0);
    expect(out).toEqual(["Release 1.4.0 is at Closed"]);
  });

  test("run-stage runs a single stage", () => {
    git.signingError = "gpg: signing failed: No secret key";
    run(["start", "--bump", "minor"], deps);
    git.signingError = null;

    expect(run(["run-stage", "1.4.0", "Tagged"], deps)).toBe(0);
    expect(out).toEqual(["Release 1.4.0 is at Tagged"]);
  });

  test("start requires exactly one version choice", () => {
    expect(run(["start"], deps)).toBe(1);
    expect(err).toEqual(["Pass exactly one of --bump or --release-version"]);
  });

  test("start rejects an unknown bump type", () => {
    expect(run(["start", "--bump", "huge"], deps)).toBe(1);
  });

  test("engine errors outside a workflow run are printed by kind", () => {
    expect(run(["unlock", "1.4.0"], deps)).toBe(1);
    expect(err).toEqual(['[InvalidVersion] Invalid release line "1.4.0". Must be MAJOR.MINOR (e.g., 1.4)']);
  });

  test("status of an unknown release fails with NotFound", () => {
    expect(run(["status", "2.0.0"], deps)).toBe(1);
    expect(err).toEqual(["[NotFound] No release record for 2.0.0"]);
  });

  test("a missing config file is reported", () => {
    expect(run(["--config", "other.yaml", "status"], deps)).toBe(1);
    expect(err).toEqual(["Config file not found: /project/other.yaml"]);
  });
});
