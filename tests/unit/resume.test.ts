import { resolveResumePosition } from "../../src/application/ingest-comments/resume";

describe("resolveResumePosition", () => {
  const start = 1606780800; // 2020-12-01

  it("starts at the configured start when the store is empty", () => {
    expect(resolveResumePosition(start, undefined)).toEqual({ cursor: start, resumed: false });
  });

  it("resumes from the newest stored comment when it is past the start", () => {
    expect(resolveResumePosition(start, 1610668800)).toEqual({ cursor: 1610668800, resumed: true });
  });

  it("ignores stored comments older than or equal to the start", () => {
    expect(resolveResumePosition(start, start - 3600)).toEqual({ cursor: start, resumed: false });
    expect(resolveResumePosition(start, start)).toEqual({ cursor: start, resumed: false });
  });
});
