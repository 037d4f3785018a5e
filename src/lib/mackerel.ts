import { SinkError, errorMessage } from "./errors";
import type { MetricKind, MetricPoint } from "./types";

export interface MetricSink {
  post(point: MetricPoint): Promise<void>;
}

// The video id is part of the name so a new MV starts a new series
export const metricName = (
  namespace: string,
  kind: MetricKind,
  groupId: string,
  videoId: string
) => `${namespace}.${kind}.${groupId}_${videoId}`;

export type MackerelOptions = {
  apiKey: string;
  service: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

/** Posts one service metric point per call (POST /services/:service/tsdb). */
export class MackerelSink implements MetricSink {
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opt: MackerelOptions) {
    const base = (opt.baseUrl ?? "https://api.mackerelio.com/api/v0").replace(/\/+$/, "");
    this.url = `${base}/services/${encodeURIComponent(opt.service)}/tsdb`;
    this.fetchImpl = opt.fetchImpl ?? fetch;
  }

  async post(point: MetricPoint): Promise<void> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.url, {
        method: "POST",
        headers: {
          "X-Api-Key": this.opt.apiKey,
          "Content-Type": "application/json",
        },
        body: JSON.stringify([{ name: point.name, time: point.time, value: point.value }]),
        signal: AbortSignal.timeout(this.opt.timeoutMs ?? 10_000),
      });
    } catch (e) {
      throw new SinkError(`Mackerel post failed for ${point.name}: ${errorMessage(e)}`);
    }
    if (!res.ok) {
      const body = await res.text().catch(() => "");
      throw new SinkError(
        `Mackerel rejected ${point.name} (status=${res.status}) ${body}`.trim(),
        res.status
      );
    }
  }
}
