import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { AdapterErrorCode } from "../../utils/errors.js";
import { HttpCandidateSource } from "../candidates.js";
import { SlackNotifier } from "../notifier.js";

interface Received {
  method: string;
  body: string;
}

/** Local stand-in for the Slack webhook and the screener endpoint. */
describe("HTTP-backed adapters", () => {
  let server: Server;
  let url: string;
  let received: Received[];
  let reply: { status: number; body: string };

  beforeEach(async () => {
    received = [];
    reply = { status: 200, body: "ok" };
    server = createServer((req: IncomingMessage, res: ServerResponse) => {
      let body = "";
      req.on("data", (chunk: Buffer) => {
        body += chunk.toString("utf8");
      });
      req.on("end", () => {
        received.push({ method: req.method ?? "", body });
        res.writeHead(reply.status, { "content-type": "application/json" });
        res.end(reply.body);
      });
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server has no port");
    url = `http://127.0.0.1:${address.port}/hook`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  describe("SlackNotifier", () => {
    it("posts the message with a severity prefix", async () => {
      await new SlackNotifier(url, 1_000).notify("critical", "CIRCUIT BREAKER [ACC1]");

      expect(received).toHaveLength(1);
      expect(received[0].method).toBe("POST");
      expect(JSON.parse(received[0].body)).toEqual({
        text: ":rotating_light: *Market Autopilot*\nCIRCUIT BREAKER [ACC1]",
        username: "Market Autopilot",
      });
    });

    it("reports a 429 as RATE_LIMITED", async () => {
      reply = { status: 429, body: "{}" };
      await expect(new SlackNotifier(url, 1_000).notify("info", "hello")).rejects.toMatchObject({
        adapter: "notifier",
        code: AdapterErrorCode.RATE_LIMITED,
        status: 429,
      });
    });
  });

  describe("HttpCandidateSource", () => {
    it("parses the screener's response", async () => {
      reply = {
        status: 200,
        body: JSON.stringify({
          candidates: [
            { symbol: "msft", score: 71, confidence: 8 },
            { symbol: "AAPL", score: 85, confidence: 9 },
          ],
        }),
      };

      const candidates = await new HttpCandidateSource(url, 1_000).getQualifiedCandidates();

      expect(received[0].method).toBe("GET");
      expect(candidates).toEqual([
        { symbol: "AAPL", score: 85, confidence: 9 },
        { symbol: "MSFT", score: 71, confidence: 8 },
      ]);
    });
  });
});
