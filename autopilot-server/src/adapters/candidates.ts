import { readFile } from "node:fs/promises";
import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { ScoredCandidate } from "../core/types.js";
import type { CandidateSource } from "./types.js";

const candidateSchema = z.object({
  symbol: z.string().min(1).transform((s) => s.toUpperCase()),
  score: z.number(),
  confidence: z.number(),
});

const candidateListSchema = z.union([
  z.array(candidateSchema),
  z.object({ candidates: z.array(candidateSchema) }).transform((doc) => doc.candidates),
]);

export function parseCandidates(raw: unknown): ScoredCandidate[] {
  return candidateListSchema
    .parse(raw)
    .sort((a, b) => b.score - a.score || b.confidence - a.confidence);
}

/**
 * Candidates from a JSON file the external screener writes.
 */
export class FileCandidateSource implements CandidateSource {
  constructor(private readonly path: string) {}

  async getQualifiedCandidates(): Promise<ScoredCandidate[]> {
    return parseCandidates(JSON.parse(await readFile(this.path, "utf8")));
  }
}

/**
 * Candidates from the screener's HTTP endpoint.
 */
export class HttpCandidateSource implements CandidateSource {
  private readonly http: AxiosInstance;

  constructor(url: string, timeoutMs: number) {
    this.http = axios.create({ baseURL: url, timeout: timeoutMs });
  }

  async getQualifiedCandidates(): Promise<ScoredCandidate[]> {
    const response = await this.http.get<unknown>("");
    return parseCandidates(response.data);
  }
}

/**
 * Loads from the source at most once per cycle and remembers the last good
 * list for display.
 */
export class CycleCandidateCache {
  private cycle = -1;
  private inflight: Promise<ScoredCandidate[]> | null = null;
  private latest: readonly ScoredCandidate[] = [];
  private latestAt: Date | null = null;

  constructor(private readonly source: CandidateSource) {}

  forCycle(sequence: number, now: Date): Promise<ScoredCandidate[]> {
    if (this.cycle !== sequence || this.inflight === null) {
      this.cycle = sequence;
      this.inflight = this.source.getQualifiedCandidates().then((list) => {
        this.latest = Object.freeze([...list]);
        this.latestAt = now;
        return list;
      });
    }
    return this.inflight;
  }

  last(): { candidates: readonly ScoredCandidate[]; refreshedAt: Date | null } {
    return { candidates: this.latest, refreshedAt: this.latestAt };
  }
}
