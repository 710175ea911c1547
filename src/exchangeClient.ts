import { z } from "zod";
import { MonitorError, toMonitorError } from "./errors";
import { toLowerAddress } from "./utils";

const decimalString = z
  .string()
  .regex(/^-?\d+(\.\d+)?$/, "expected a decimal string");

const marginSummarySchema = z
  .object({
    accountValue: decimalString,
    totalNtlPos: decimalString.optional(),
    totalRawUsd: decimalString.optional(),
    totalMarginUsed: decimalString.optional(),
  })
  .passthrough();

const assetPositionSchema = z
  .object({
    type: z.string().optional(),
    position: z
      .object({
        coin: z.string(),
        szi: decimalString,
        entryPx: decimalString.nullable().optional(),
        unrealizedPnl: decimalString.optional(),
      })
      .passthrough(),
  })
  .passthrough();

export const userStateSchema = z
  .object({
    marginSummary: marginSummarySchema,
    assetPositions: z.array(assetPositionSchema).default([]),
    withdrawable: decimalString.optional(),
    time: z.number().optional(),
  })
  .passthrough();

export type ExchangeUserState = z.infer<typeof userStateSchema>;

export interface ExchangeDataSource {
  getUserState(address: string): Promise<ExchangeUserState | null>;
}

/**
 * Reader for the exchange's public info endpoint. Payloads are schema-checked
 * before they reach a snapshot.
 */
export class ExchangeClient implements ExchangeDataSource {
  constructor(
    private readonly apiBase: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async getUserState(address: string): Promise<ExchangeUserState | null> {
    const payload = await this.postInfo({
      type: "clearinghouseState",
      user: toLowerAddress(address),
    });
    if (payload === null) {
      return null;
    }
    const parsed = userStateSchema.safeParse(payload);
    if (!parsed.success) {
      throw new MonitorError(
        `Malformed user state for ${address}: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")} ${issue.message}`)
          .join("; ")}`,
        "Validation",
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  private async postInfo(body: Record<string, string>): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.apiBase}/info`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error: unknown) {
      throw toMonitorError(error, "TransientNetwork");
    }

    if (!response.ok) {
      const transient = response.status === 429 || response.status >= 500;
      throw new MonitorError(
        `Exchange info request failed with status ${response.status}`,
        transient ? "TransientNetwork" : "DataUnavailable",
      );
    }

    try {
      return await response.json();
    } catch (error: unknown) {
      throw new MonitorError("Exchange returned a non-JSON body", "Validation", {
        cause: error,
      });
    }
  }
}
