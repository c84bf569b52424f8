import { BridgeValidationError } from "../errors";
import { Methods } from "../methods";
import type { BridgeCaller, JsonValue } from "../type";

export type PaymentIntentOptions = {
  amount?: number; // 最小货币单位，例如美分
  currency?: string;
  metadata?: { [key: string]: JsonValue };
};

export type PaymentSheetOptions = {
  clientSecret: string;
  merchantDisplayName: string;
  publishableKey: string;
  additionalOptions?: { [key: string]: JsonValue };
};

function requireValue(field: string, value: string | undefined): string {
  if (!value) {
    throw new BridgeValidationError(field);
  }
  return value;
}

/**
 * 把最小货币单位格式化为展示金额，例如 1999 -> "$19.99"
 */
export function formatAmount(amountInCents: number, currency = "usd"): string {
  return new Intl.NumberFormat("en-US", {
    style: "currency",
    currency: currency.toUpperCase(),
  }).format(amountInCents / 100);
}

export function createMobileWallet(bridge: BridgeCaller) {
  return {
    isAvailable: () => bridge.call(Methods.MobileWallet.IsAvailable, {}),

    createPaymentIntent: (options: PaymentIntentOptions = {}) =>
      bridge.call(Methods.MobileWallet.CreatePaymentIntent, {
        ...(options.amount === undefined ? {} : { amount: options.amount }),
        currency: options.currency || "usd",
        metadata: options.metadata || {},
      }),

    /**
     * 展示支付面板。缺少必填字段时直接 reject，不会请求原生端
     */
    presentPaymentSheet: async (options: Partial<PaymentSheetOptions>) =>
      bridge.call(Methods.MobileWallet.PresentPaymentSheet, {
        clientSecret: requireValue("clientSecret", options.clientSecret),
        merchantDisplayName: requireValue("merchantDisplayName", options.merchantDisplayName),
        publishableKey: requireValue("publishableKey", options.publishableKey),
        options: options.additionalOptions || {},
      }),

    confirmPayment: async (paymentIntentId: string) =>
      bridge.call(Methods.MobileWallet.ConfirmPayment, {
        paymentIntentId: requireValue("paymentIntentId", paymentIntentId),
      }),

    getPaymentStatus: async (paymentIntentId: string) =>
      bridge.call(Methods.MobileWallet.GetPaymentStatus, {
        paymentIntentId: requireValue("paymentIntentId", paymentIntentId),
      }),

    formatAmount,
  };
}
