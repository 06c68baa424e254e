import http from "http";
import { URL } from "url";
import type { RawComment } from "./core/comments/comment.types";

/**
 * Minimal fake comment archive for local runs and pipeline tests.
 * - GET /comments/search?subreddit=&after=&before=&limit=&sort=asc
 * Answers `{ data: [...] }` with comments where after < created_utc < before,
 * oldest first.
 *
 * `throttleFirst` / `failFirst` make the first N requests answer 429 / 500.
 */
export type FakeArchiveOptions = {
  comments: RawComment[];
  throttleFirst?: number;
  failFirst?: number;
  retryAfterSeconds?: number;
};

export type FakeArchiveServer = {
  server: http.Server;
  requests: URL[];
};

const createdOf = (comment: RawComment): number =>
  typeof comment.created_utc === "number" ? comment.created_utc : 0;

export const createFakeArchiveServer = (options: FakeArchiveOptions): FakeArchiveServer => {
  const requests: URL[] = [];
  const sorted = [...options.comments].sort((a, b) => createdOf(a) - createdOf(b));
  let throttled = 0;
  let failed = 0;

  const server = http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    if (!url.pathname.endsWith("/comments/search")) {
      res.writeHead(404);
      res.end();
      return;
    }
    requests.push(url);

    if (throttled < (options.throttleFirst ?? 0)) {
      throttled += 1;
      const headers: Record<string, string> = { "content-type": "application/json" };
      if (options.retryAfterSeconds != null) headers["Retry-After"] = String(options.retryAfterSeconds);
      res.writeHead(429, headers);
      res.end(JSON.stringify({ error: "rate_limited" }));
      return;
    }

    if (failed < (options.failFirst ?? 0)) {
      failed += 1;
      res.writeHead(500, { "content-type": "text/plain" });
      res.end("temporary failure");
      return;
    }

    const subreddit = url.searchParams.get("subreddit");
    const after = Number(url.searchParams.get("after") ?? "0");
    const before = Number(url.searchParams.get("before") ?? String(Number.MAX_SAFE_INTEGER));
    const limit = Number(url.searchParams.get("limit") ?? "100");

    const data = sorted
      .filter((comment) => subreddit == null || comment.subreddit === subreddit)
      .filter((comment) => createdOf(comment) > after && createdOf(comment) < before)
      .slice(0, limit);

    res.writeHead(200, { "content-type": "application/json" });
    res.end(JSON.stringify({ data }));
  });

  return { server, requests };
};

const seedComments = (subreddit: string, start: number, count: number, spacingSeconds: number): RawComment[] =>
  Array.from({ length: count }, (_, i) => ({
    id: `c${i + 1}`,
    body: i % 7 === 6 ? "[deleted]" : `comment number ${i + 1}`,
    author: `user${i % 13}`,
    score: i % 5,
    created_utc: start + i * spacingSeconds,
    parent_id: `t3_post${Math.floor(i / 10)}`,
    permalink: `/r/${subreddit}/comments/post${Math.floor(i / 10)}/_/c${i + 1}/`,
    subreddit
  }));

if (require.main === module) {
  const port = Number(process.env.FAKE_ARCHIVE_PORT ?? 3999);
  // 2020-12-01T00:00:00Z, one comment every ten minutes for a bit over three days
  const comments = seedComments("wallstreetbets", 1606780800, 450, 600);
  const { server } = createFakeArchiveServer({ comments });

  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake comment archive on http://localhost:${port}`);
  });
}
