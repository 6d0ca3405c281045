import { createListCandidateSource } from "../../src/infrastructure/ipsources/ListCandidateSource";
import { createRemoteCandidateSource, shuffleInPlace } from "../../src/infrastructure/ipsources/RemoteCandidateSource";
import type { IpSourceDefinition } from "../../src/infrastructure/ipsources/ipSource.catalog";
import { resolveIpSources } from "../../src/infrastructure/ipsources/ipSource.catalog";
import { CandidateSourceUnavailableError } from "../../src/ports/CandidateSource";
import type { IpSourceClient } from "../../src/ports/IpSourceClient";
import { silenceConsole } from "./helpers/fakes";

const source = (name: string): IpSourceDefinition => ({
  name,
  url: `http://lists.example.test/${name}.txt`,
  samplesPerCidr: 1
});

const stubClient = (bodies: Record<string, string | Error>) => {
  const fetchList = jest.fn(async (url: string) => {
    const body = bodies[url];
    if (body === undefined || body instanceof Error) throw body ?? new Error(`no stub for ${url}`);
    return body;
  });
  const client: IpSourceClient = { fetchList };
  return { client, fetchList };
};

describe("createListCandidateSource", () => {
  it("serves batches in order with duplicates collapsed", async () => {
    const list = createListCandidateSource(["10.0.0.1", "10.0.0.2", "10.0.0.1", "10.0.0.3"]);

    await expect(list.nextBatch(2)).resolves.toEqual([{ address: "10.0.0.1" }, { address: "10.0.0.2" }]);
    await expect(list.nextBatch(2)).resolves.toEqual([{ address: "10.0.0.3" }]);
    await expect(list.nextBatch(2)).resolves.toEqual([]);
  });

  it("keeps the first entry for an address, port included", async () => {
    const list = createListCandidateSource([{ address: "10.0.0.1", port: 2053 }, "10.0.0.1"]);

    await expect(list.nextBatch(5)).resolves.toEqual([{ address: "10.0.0.1", port: 2053 }]);
  });
});

describe("shuffleInPlace", () => {
  it("is a permutation driven by the random source", () => {
    expect(shuffleInPlace([1, 2, 3, 4], () => 0)).toEqual([2, 3, 4, 1]);
  });
});

describe("resolveIpSources", () => {
  it("looks up catalog entries by name", () => {
    expect(resolveIpSources(["as13335"])[0].url).toBe(
      "https://raw.githubusercontent.com/ipverse/asn-ip/master/as/13335/ipv4-aggregated.txt"
    );
  });

  it("rejects unknown names", () => {
    expect(() => resolveIpSources(["nope"])).toThrow('Unknown IP source "nope". Known sources: official, cm,');
  });
});

describe("createRemoteCandidateSource", () => {
  let restoreConsole: () => void;

  beforeEach(() => {
    restoreConsole = silenceConsole();
  });

  afterEach(() => {
    restoreConsole();
  });

  it("downloads every source once and serves the merged pool", async () => {
    const { client, fetchList } = stubClient({
      "http://lists.example.test/a.txt": "10.0.0.1\n10.0.0.2\n",
      "http://lists.example.test/b.txt": "10.0.0.2\n10.0.0.3\n"
    });
    const remote = createRemoteCandidateSource({ client, sources: [source("a"), source("b")], random: () => 0.99 });

    const first = await remote.nextBatch(2);
    const rest = await remote.nextBatch(10);

    expect([...first, ...rest].map((c) => c.address).sort()).toEqual(["10.0.0.1", "10.0.0.2", "10.0.0.3"]);
    await expect(remote.nextBatch(10)).resolves.toEqual([]);
    expect(fetchList).toHaveBeenCalledTimes(2);
  });

  it("skips failing sources while others succeed", async () => {
    const { client } = stubClient({
      "http://lists.example.test/a.txt": new Error("IP source request failed: 503"),
      "http://lists.example.test/b.txt": "10.0.0.9\n"
    });
    const remote = createRemoteCandidateSource({ client, sources: [source("a"), source("b")] });

    await expect(remote.nextBatch(5)).resolves.toEqual([{ address: "10.0.0.9" }]);
    const warned = jest.mocked(console.warn).mock.calls.map((call) => JSON.parse(String(call[0])));
    expect(warned).toEqual([{ event: "source.failed", source: "a", reason: "IP source request failed: 503" }]);
  });

  it("is unavailable when every source fails", async () => {
    const { client } = stubClient({});
    const remote = createRemoteCandidateSource({ client, sources: [source("a"), source("b")], concurrency: 1 });

    const promise = remote.nextBatch(5);
    await expect(promise).rejects.toBeInstanceOf(CandidateSourceUnavailableError);
    await expect(promise).rejects.toMatchObject({
      message: "All 2 IP sources failed: a, b",
      failedSources: ["a", "b"]
    });
  });

  it("caps the pool at maxPoolSize", async () => {
    const { client } = stubClient({ "http://lists.example.test/a.txt": "10.0.0.1\n10.0.0.2\n10.0.0.3\n" });
    const remote = createRemoteCandidateSource({ client, sources: [source("a")], maxPoolSize: 2 });

    await expect(remote.nextBatch(10)).resolves.toHaveLength(2);
  });
});
