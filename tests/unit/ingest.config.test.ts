import {
  defaultIngestConfig,
  resolveIngestConfig
} from "../../src/application/ingest-comments/ingest.config";

describe("resolveIngestConfig", () => {
  it("fills defaults and derives epoch bounds", () => {
    expect(resolveIngestConfig()).toEqual({
      ...defaultIngestConfig,
      startEpoch: 1606780800,
      endEpoch: 1617148800
    });
  });

  it("trims string settings and falls back on blanks", () => {
    const config = resolveIngestConfig({ subreddit: "  stocks ", startDate: " ", endDate: " 2020-12-05 " });

    expect(config.subreddit).toBe("stocks");
    expect(config.startDate).toBe("2020-12-01");
    expect(config.endDate).toBe("2020-12-05");
    expect(config.endEpoch).toBe(1607126400);
  });

  it.each([
    [{ pageSize: 0 }, "pageSize=0 is out of allowed range [1..100]"],
    [{ pageSize: 101 }, "pageSize=101 is out of allowed range [1..100]"],
    [{ checkpointInterval: 0 }, "checkpointInterval=0 is out of allowed range [1..10000]"],
    [{ maxConsecutiveGaps: 1.5 }, "maxConsecutiveGaps=1.5 is out of allowed range [1..100]"],
    [{ startDate: "2020-13-01" }, 'Invalid date "2020-13-01": no such calendar day'],
    [{ startDate: "2021-01-02", endDate: "2021-01-02" }, "endDate=2021-01-02 must be after startDate=2021-01-02"],
    [{ startDate: "2021-02-01", endDate: "2021-01-01" }, "endDate=2021-01-01 must be after startDate=2021-02-01"]
  ])("rejects %j", (input, message) => {
    expect(() => resolveIngestConfig(input)).toThrow(message);
  });
});
