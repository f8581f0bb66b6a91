import http from "http";
import { URL } from "url";

/**
 * Minimal fake execution agent for local runs and e2e.
 * - POST /executions with the execution request JSON
 * Succeeds unless the profileRef is listed in `failProfiles`, in which case it answers
 * `{ success: false, errorMessage }` like an agent whose login expired.
 */
export type FakeAgentOptions = {
  delayMs?: number;
  failProfiles?: string[];
  failureMessage?: string;
};

export type FakeAgentCall = {
  jobId?: unknown;
  listingRef?: unknown;
  profileRef?: unknown;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const createFakeAgentServer = (options: FakeAgentOptions = {}) => {
  const calls: FakeAgentCall[] = [];
  const failProfiles = new Set(options.failProfiles ?? []);

  const server = http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    if (req.method !== "POST" || url.pathname !== "/executions") {
      res.writeHead(404);
      res.end();
      return;
    }

    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      let call: FakeAgentCall = {};
      try {
        const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString("utf8"));
        if (isRecord(parsed)) {
          call = { jobId: parsed.jobId, listingRef: parsed.listingRef, profileRef: parsed.profileRef };
        }
      } catch {
        res.writeHead(400, { "content-type": "application/json" });
        res.end(JSON.stringify({ errorMessage: "invalid json" }));
        return;
      }
      calls.push(call);

      const fail = typeof call.profileRef === "string" && failProfiles.has(call.profileRef);
      const body = fail
        ? { success: false, errorMessage: options.failureMessage ?? "login expired" }
        : { success: true };

      setTimeout(() => {
        res.writeHead(200, { "content-type": "application/json" });
        res.end(JSON.stringify(body));
      }, options.delayMs ?? 0);
    });
  });

  return { server, calls };
};

if (require.main === module) {
  const port = Number(process.env.FAKE_AGENT_PORT ?? 4010);
  const { server } = createFakeAgentServer({
    delayMs: Number(process.env.FAKE_AGENT_DELAY_MS ?? 500),
    failProfiles: (process.env.FAKE_AGENT_FAIL_PROFILES ?? "").split(",").filter((p) => p.trim() !== "")
  });

  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake execution agent on http://localhost:${port}`);
  });
}
