import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { RefNotFoundError, RemoteUnreachableError } from "../../../core/errors.js";
import { commandResult, createFakePorts, FakeVcs, type FakePorts } from "../__tests__/fakes.js";

import { syncAll, type SyncAllRequest } from "./project-set-sync.js";

let root: string;
let ports: FakePorts;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "project-set-sync-"));
  ports = createFakePorts(
    new FakeVcs()
      .addRemote("nova", { branches: ["master"], changeRefs: { "refs/zuul/master/Z1": "sha-nova-z1" } })
      .addRemote("glance", { branches: ["master"] })
      .addRemote("keystone", { branches: ["master"] }),
  );
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

function request(projectUnderTest: string): SyncAllRequest {
  return {
    projectSet: ["openstack/nova", "openstack/glance", "openstack/keystone"],
    branch: "master",
    destinationRoot: path.join(root, "new"),
    queue: { branch: "master", changeRef: "refs/zuul/master/Z1", projectUnderTest },
    remoteUrlTemplate: "https://git.test/{project}",
    changeUrl: "http://zuul.test/p",
  };
}

describe("syncAll", () => {
  it("syncs every project in order", async () => {
    const synced = await syncAll(request("openstack/nova"), ports);

    expect(synced.ok).toBe(true);
    if (!synced.ok) return;
    expect(synced.result.map((state) => [state.project, state.headSha])).toEqual([
      ["openstack/nova", "sha-nova-z1"],
      ["openstack/glance", "glance@master"],
      ["openstack/keystone", "keystone@master"],
    ]);
    expect(ports.lines.slice(0, 3)).toEqual([
      "Using branch: master",
      "Setting up openstack/nova @ master",
      "  Need to clone nova",
    ]);
  });

  it("stops at the first project that cannot be resolved", async () => {
    const synced = await syncAll(request("openstack/glance"), ports);

    expect(synced.ok).toBe(false);
    if (synced.ok) return;
    expect(synced.error).toBeInstanceOf(RefNotFoundError);
    expect(ports.vcs.callsMatching("clone")).toEqual([
      "clone https://git.test/openstack/nova nova",
      "clone https://git.test/openstack/glance glance",
    ]);
    expect(ports.vcs.callsMatching("checkout glance")).toEqual([]);
    expect(ports.events.types()).toContain("project.setup.failed");
    expect(ports.lines).toContain("Unable to find ref refs/zuul/master/Z1 for openstack/glance");
  });

  it("stops when a remote cannot be refreshed", async () => {
    const down = commandResult(1, { stderr: "fatal: unable to access 'https://git.test/openstack/nova/'" });
    ports.vcs.queueRemoteUpdate(down, down, down);

    const synced = await syncAll(request("openstack/nova"), ports);

    expect(synced.ok).toBe(false);
    if (synced.ok) return;
    expect(synced.error).toBeInstanceOf(RemoteUnreachableError);
    expect(ports.vcs.callsMatching("clone")).toEqual(["clone https://git.test/openstack/nova nova"]);
  });

  it("can be run again over the same destination", async () => {
    const first = await syncAll(request("openstack/nova"), ports);
    const second = await syncAll(request("openstack/nova"), ports);

    expect(second).toEqual(first);
    expect(ports.vcs.callsMatching("clone")).toHaveLength(3);
  });
});
