import { z } from "zod";
import type { Env } from "../config/env.js";
import { amountToCents, formatCents } from "../utils/money.js";

export interface TransferRequest {
  accountNumber: string;
  routingCode: string;
  amount: number;
  /** Our disbursement id, echoed back by the gateway. */
  reference: string;
}

export type TransferResult =
  | { success: true; reference: string }
  | { success: false; reason: string };

export interface TransferGateway {
  transfer(request: TransferRequest): Promise<TransferResult>;
}

const gatewayResponseSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("success"), reference: z.string().min(1) }),
  z.object({ status: z.literal("failed"), reason: z.string().min(1) }),
]);

interface HttpTransferGatewayOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

export class HttpTransferGateway implements TransferGateway {
  constructor(private readonly options: HttpTransferGatewayOptions) {}

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiKey) headers.Authorization = `Bearer ${this.options.apiKey}`;
    return headers;
  }

  async transfer(request: TransferRequest): Promise<TransferResult> {
    const res = await fetch(`${this.options.baseUrl.replace(/\/+$/, "")}/transfers`, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify({
        account_number: request.accountNumber,
        routing_code: request.routingCode,
        amount: formatCents(amountToCents(request.amount)),
        reference: request.reference,
      }),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!res.ok) {
      return { success: false, reason: `Transfer gateway responded with HTTP ${res.status}` };
    }

    const parsed = gatewayResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      return { success: false, reason: "Transfer gateway returned an unrecognised response" };
    }
    if (parsed.data.status === "success") {
      return { success: true, reference: parsed.data.reference };
    }
    return { success: false, reason: parsed.data.reason };
  }
}

export const unconfiguredTransferGateway: TransferGateway = {
  async transfer() {
    return { success: false, reason: "Transfer gateway is not configured" };
  },
};

export function createTransferGateway(
  config: Pick<Env, "TRANSFER_GATEWAY_URL" | "TRANSFER_GATEWAY_API_KEY" | "TRANSFER_GATEWAY_TIMEOUT_MS">,
): TransferGateway {
  if (!config.TRANSFER_GATEWAY_URL) return unconfiguredTransferGateway;
  return new HttpTransferGateway({
    baseUrl: config.TRANSFER_GATEWAY_URL,
    apiKey: config.TRANSFER_GATEWAY_API_KEY,
    timeoutMs: config.TRANSFER_GATEWAY_TIMEOUT_MS,
  });
}
