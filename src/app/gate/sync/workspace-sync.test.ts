import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { GitError, RemoteUnreachableError } from "../../../core/errors.js";
import { commandResult, createFakePorts, FakeVcs, type FakePorts } from "../__tests__/fakes.js";

import {
  prepareWorkTree,
  syncWorkTree,
  type SyncOptions,
} from "./workspace-sync.js";

const OPTIONS: SyncOptions = {
  remoteUrlTemplate: "https://git.test/{project}",
  changeUrl: "http://zuul.test/p",
};

const NETWORK_DOWN = commandResult(1, {
  stderr: "fatal: unable to access 'https://git.test/openstack/nova/'\n",
});

let root: string;
let ports: FakePorts;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "workspace-sync-"));
  ports = createFakePorts(
    new FakeVcs().addRemote("nova", {
      branches: ["master", "stable/havana"],
      changeRefs: { "refs/zuul/stable/havana/Z1": "sha-z1" },
    }),
  );
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe("prepareWorkTree", () => {
  it("clones a missing tree, then refreshes and prunes its remote", async () => {
    const prepared = await prepareWorkTree("openstack/nova", root, OPTIONS, ports);

    expect(prepared).toEqual({ ok: true, result: path.join(root, "nova") });
    expect(ports.vcs.calls).toEqual([
      "clone https://git.test/openstack/nova nova",
      "set-url nova https://git.test/openstack/nova",
      "remote-update nova 300",
      "prune nova",
    ]);
    expect(ports.lines).toContain("  Need to clone nova");
  });

  it("reuses an existing tree but resets its origin", async () => {
    fs.mkdirSync(path.join(root, "nova"));

    await prepareWorkTree("openstack/nova", root, OPTIONS, ports);

    expect(ports.vcs.callsMatching("clone")).toEqual([]);
    expect(ports.vcs.originOf(path.join(root, "nova"))).toBe("https://git.test/openstack/nova");
  });

  it("gives up after three failed remote updates", async () => {
    ports.vcs.queueRemoteUpdate(NETWORK_DOWN, NETWORK_DOWN, NETWORK_DOWN);

    const prepared = await prepareWorkTree("openstack/nova", root, OPTIONS, ports);

    expect(prepared.ok).toBe(false);
    if (prepared.ok) return;
    expect(prepared.error).toBeInstanceOf(RemoteUnreachableError);
    expect(prepared.error.message).toBe(
      "git remote update failed 3 times for openstack/nova: fatal: unable to access 'https://git.test/openstack/nova/'",
    );
    expect(ports.vcs.callsMatching("remote-update")).toHaveLength(3);
    expect(ports.vcs.callsMatching("prune")).toEqual([]);
    expect(ports.pause.sleeps).toEqual([30_000, 30_000]);
    expect(ports.events.types()).toEqual([
      "workspace.clone.start",
      "remote.update.retry",
      "remote.update.retry",
      "remote.update.exhausted",
    ]);
  });

  it("continues when the third remote update succeeds", async () => {
    ports.vcs.queueRemoteUpdate(NETWORK_DOWN, NETWORK_DOWN, commandResult(0));

    const prepared = await prepareWorkTree("openstack/nova", root, OPTIONS, ports);

    expect(prepared.ok).toBe(true);
    expect(ports.vcs.callsMatching("remote-update")).toHaveLength(3);
    expect(ports.vcs.callsMatching("prune")).toEqual(["prune nova"]);
    expect(ports.lines.filter((line) => line === "git remote update failed.")).toHaveLength(2);
    expect(ports.lines).toContain("sleep 30 before retrying.");
  });
});

describe("syncWorkTree", () => {
  async function prepare(): Promise<void> {
    const prepared = await prepareWorkTree("openstack/nova", root, OPTIONS, ports);
    expect(prepared.ok).toBe(true);
  }

  it("propagates a failed outcome without touching the tree", async () => {
    const error = new GitError("resolution failed");

    const synced = await syncWorkTree(
      "openstack/nova",
      { kind: "failed", reason: "resolution failed", error },
      root,
      OPTIONS,
      ports,
    );

    expect(synced).toEqual({ ok: false, error });
    expect(ports.vcs.calls).toEqual([]);
  });

  it("checks out a fetched change reference", async () => {
    await prepare();

    const synced = await syncWorkTree(
      "openstack/nova",
      { kind: "change-ref", ref: "refs/zuul/stable/havana/Z1" },
      root,
      OPTIONS,
      ports,
    );

    expect(synced).toEqual({
      ok: true,
      result: {
        project: "openstack/nova",
        path: path.join(root, "nova"),
        checkedOut: "FETCH_HEAD",
        headSha: "sha-z1",
        clean: true,
      },
    });
    expect(ports.vcs.calls.slice(4)).toEqual([
      "fetch http://zuul.test/p/openstack/nova refs/zuul/stable/havana/Z1",
      "checkout nova FETCH_HEAD",
      "reset nova FETCH_HEAD",
      "clean nova",
    ]);
  });

  it("refetches a change reference after the change server drops a request", async () => {
    await prepare();
    ports.vcs.markUnreachable("refs/zuul/stable/havana/Z1", 1);

    const synced = await syncWorkTree(
      "openstack/nova",
      { kind: "change-ref", ref: "refs/zuul/stable/havana/Z1" },
      root,
      OPTIONS,
      ports,
    );

    expect(synced.ok).toBe(true);
    if (!synced.ok) return;
    expect(synced.result.headSha).toBe("sha-z1");
    expect(ports.vcs.callsMatching("fetch")).toHaveLength(2);
    expect(ports.pause.sleeps).toEqual([30_000]);
  });

  it("fails as unreachable when every refetch of the change reference fails", async () => {
    await prepare();
    ports.vcs.markUnreachable("refs/zuul/stable/havana/Z1");

    const synced = await syncWorkTree(
      "openstack/nova",
      { kind: "change-ref", ref: "refs/zuul/stable/havana/Z1" },
      root,
      OPTIONS,
      ports,
    );

    expect(synced.ok).toBe(false);
    if (synced.ok) return;
    expect(synced.error).toBeInstanceOf(RemoteUnreachableError);
    expect(ports.vcs.callsMatching("fetch")).toHaveLength(3);
    expect(ports.vcs.callsMatching("checkout")).toEqual([]);
    expect(ports.pause.sleeps).toEqual([30_000, 30_000]);
  });

  it("hard-resets to the remote-tracking branch", async () => {
    await prepare();

    const synced = await syncWorkTree(
      "openstack/nova",
      { kind: "branch-head", branch: "stable/havana" },
      root,
      OPTIONS,
      ports,
    );

    expect(synced.ok).toBe(true);
    if (!synced.ok) return;
    expect(synced.result.checkedOut).toBe("remotes/origin/stable/havana");
    expect(synced.result.headSha).toBe("nova@stable/havana");
    expect(ports.vcs.calls.slice(4)).toEqual([
      "checkout nova stable/havana",
      "reset nova remotes/origin/stable/havana",
      "clean nova",
    ]);
  });

  it("yields the same state when run twice", async () => {
    const outcome = { kind: "branch-head", branch: "master" } as const;

    await prepare();
    const first = await syncWorkTree("openstack/nova", outcome, root, OPTIONS, ports);
    await prepare();
    const second = await syncWorkTree("openstack/nova", outcome, root, OPTIONS, ports);

    expect(second).toEqual(first);
  });

  it("cleans a stale cached tree", async () => {
    fs.mkdirSync(path.join(root, "nova"));
    await prepare();

    const synced = await syncWorkTree(
      "openstack/nova",
      { kind: "branch-head", branch: "master" },
      root,
      OPTIONS,
      ports,
    );

    expect(synced.ok && synced.result.clean).toBe(true);
  });

  it("retries a failed clean once after a second", async () => {
    await prepare();
    ports.vcs.queueClean(false, true);

    const synced = await syncWorkTree(
      "openstack/nova",
      { kind: "branch-head", branch: "master" },
      root,
      OPTIONS,
      ports,
    );

    expect(synced.ok && synced.result.clean).toBe(true);
    expect(ports.pause.sleeps).toEqual([1000]);
    expect(ports.events.types()).toContain("workspace.clean.retry");
  });

  it("tolerates a tree that cannot be cleaned", async () => {
    fs.mkdirSync(path.join(root, "nova"));
    await prepare();
    ports.vcs.queueClean(false, false);

    const synced = await syncWorkTree(
      "openstack/nova",
      { kind: "branch-head", branch: "master" },
      root,
      OPTIONS,
      ports,
    );

    expect(synced.ok).toBe(true);
    if (!synced.ok) return;
    expect(synced.result.clean).toBe(false);
    expect(ports.events.types()).toContain("workspace.clean.tolerated");
    expect(ports.lines).toContain(`  Warning: unable to clean ${path.join(root, "nova")}; continuing.`);
  });

  it("fails when the change reference has vanished", async () => {
    await prepare();

    const synced = await syncWorkTree(
      "openstack/nova",
      { kind: "change-ref", ref: "refs/zuul/stable/havana/Z2" },
      root,
      OPTIONS,
      ports,
    );

    expect(synced.ok).toBe(false);
    if (synced.ok) return;
    expect(synced.error).toBeInstanceOf(GitError);
  });
});
