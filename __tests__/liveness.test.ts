import { checkNameServerLiveness, refineVerdict } from "../lib/liveness";
import type { LivenessResult, ResolutionOutcome } from "../lib/types";
import { answered, scriptedResolver } from "./helpers/fakeResolver";

const results = (...outcomes: ResolutionOutcome[]): LivenessResult[] =>
  outcomes.map((outcome, i) => ({ nameServer: `ns-${i}.awsdns-0${i}.com`, outcome }));

describe("refineVerdict", () => {
  test("escalates when no server can answer", () => {
    expect(refineVerdict(results({ kind: "NXDomain" }, { kind: "ServFail" }, { kind: "Timeout" }))).toBe(
      "DistinctDelegationRoute53Orphaned",
    );
    expect(refineVerdict(results({ kind: "Timeout" }, { kind: "Timeout" }))).toBe("DistinctDelegationRoute53Orphaned");
  });

  test("de-escalates when any server answers", () => {
    expect(refineVerdict(results({ kind: "NXDomain" }, answered("192.0.2.1")))).toBe("DistinctDelegationHealthy");
  });

  test("stays suspect on mixed or inconclusive results", () => {
    expect(refineVerdict(results({ kind: "NXDomain" }, { kind: "OtherError", detail: "ECONNREFUSED" }))).toBe(
      "DistinctDelegationRoute53Suspect",
    );
    expect(refineVerdict(results({ kind: "NoData" }, { kind: "ServFail" }))).toBe("DistinctDelegationRoute53Suspect");
    expect(refineVerdict([])).toBe("DistinctDelegationRoute53Suspect");
  });
});

describe("checkNameServerLiveness", () => {
  test("asks every server directly, in order", async () => {
    const resolver = scriptedResolver({
      "A dev.example.com @ns-1.awsdns-01.org": { kind: "ServFail" },
      "A dev.example.com @ns-2.awsdns-02.net": answered("192.0.2.7"),
    });

    const out = await checkNameServerLiveness(resolver, "dev.example.com", ["ns-1.awsdns-01.org", "ns-2.awsdns-02.net"]);

    expect(resolver.calls).toEqual(["A dev.example.com @ns-1.awsdns-01.org", "A dev.example.com @ns-2.awsdns-02.net"]);
    expect(out).toEqual([
      { nameServer: "ns-1.awsdns-01.org", outcome: { kind: "ServFail" } },
      { nameServer: "ns-2.awsdns-02.net", outcome: { kind: "Answered", records: ["192.0.2.7"] } },
    ]);
  });
});
