import { describe, expect, it } from "vitest";

import { createFakePorts, FakeVcs, fixedRandom } from "../__tests__/fakes.js";

import { fetchRefWithRetry, remoteRetryBackoffMs } from "./remote-retry.js";

const NOVA_FETCH_URL = "http://zuul.test/p/openstack/nova";
const REF = "refs/zuul/master/Z1";

describe("remoteRetryBackoffMs", () => {
  it("spreads retries between 30 and 89 seconds", () => {
    expect(remoteRetryBackoffMs(0)).toBe(30_000);
    expect(remoteRetryBackoffMs(0.5)).toBe(60_000);
    expect(remoteRetryBackoffMs(0.9999)).toBe(89_000);
    expect(remoteRetryBackoffMs(1)).toBe(89_000);
  });
});

describe("fetchRefWithRetry", () => {
  function setup() {
    const vcs = new FakeVcs().addRemote("nova", { branches: ["master"], changeRefs: { [REF]: "sha-z1" } });
    return createFakePorts(vcs);
  }

  it("does not retry a reference the server does not have", async () => {
    const ports = setup();

    const result = await fetchRefWithRetry("openstack/nova", "/w/nova", NOVA_FETCH_URL, "refs/zuul/master/Z9", ports);

    expect(result.kind).toBe("not-found");
    expect(ports.vcs.callsMatching("fetch")).toHaveLength(1);
    expect(ports.pause.sleeps).toEqual([]);
  });

  it("recovers when the third attempt reaches the server", async () => {
    const ports = { ...setup(), random: fixedRandom(0.5, 0) };
    ports.vcs.markUnreachable(REF, 2);

    const result = await fetchRefWithRetry("openstack/nova", "/w/nova", NOVA_FETCH_URL, REF, ports);

    expect(result).toEqual({ kind: "fetched" });
    expect(ports.vcs.callsMatching("fetch")).toHaveLength(3);
    expect(ports.pause.sleeps).toEqual([60_000, 30_000]);
    expect(ports.events.types()).toEqual(["fetch.retry", "fetch.retry"]);
  });

  it("returns unreachable after exactly three attempts", async () => {
    const ports = setup();
    ports.vcs.markUnreachable(REF);

    const result = await fetchRefWithRetry("openstack/nova", "/w/nova", NOVA_FETCH_URL, REF, ports);

    expect(result.kind).toBe("unreachable");
    expect(ports.vcs.callsMatching("fetch")).toHaveLength(3);
    expect(ports.pause.sleeps).toEqual([30_000, 30_000]);
    expect(ports.events.types()).toEqual(["fetch.retry", "fetch.retry", "fetch.exhausted"]);
  });
});
