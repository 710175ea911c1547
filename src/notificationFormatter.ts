import type { ChangeEvent, TransactionType } from "./types";
import { formatUtcTime, shortenAddress } from "./utils";

export const MAX_MESSAGE_LENGTH = 4096;

const TRANSACTION_LABELS: Record<TransactionType, string> = {
  transfer: "Outgoing transfer",
  receive: "Incoming transfer",
  unknown: "Transaction",
};

export const truncateMessage = (
  text: string,
  maxLength: number = MAX_MESSAGE_LENGTH,
): string => {
  if (text.length <= maxLength) {
    return text;
  }
  const suffix = "\n...(truncated)";
  return text.slice(0, Math.max(0, maxLength - suffix.length)) + suffix;
};

const describeEvent = (short: string, event: ChangeEvent): string[] => {
  switch (event.kind) {
    case "initial_monitor":
      return [
        "*Monitoring started*",
        `Address: \`${short}\``,
        `Balance: ${event.balance} ETH`,
        `Transactions: ${event.transactionCount}`,
      ];
    case "balance_increase":
    case "balance_decrease":
      return [
        event.kind === "balance_increase"
          ? "*Balance increased*"
          : "*Balance decreased*",
        `Address: \`${short}\``,
        `Change: ${event.delta.startsWith("-") ? "" : "+"}${event.delta} ETH`,
        `Balance: ${event.old} -> ${event.new} ETH`,
      ];
    case "new_transaction":
      return [
        `*${TRANSACTION_LABELS[event.classifiedType]}*`,
        `Address: \`${short}\``,
        `Amount: ${event.amount} ETH`,
        `From: \`${shortenAddress(event.from)}\``,
        `To: \`${event.to ? shortenAddress(event.to) : "contract creation"}\``,
        `Block: ${event.block}`,
        `Tx: \`${event.hash}\``,
      ];
    case "unknown":
      return [
        "*Unrecognised change*",
        `Address: \`${short}\``,
        `Detail: \`${event.message.replace(/`/g, "'")}\``,
      ];
  }
};

export const formatChangeNotification = (
  address: string,
  event: ChangeEvent,
  observedAt: string,
): string =>
  truncateMessage(
    [
      ...describeEvent(shortenAddress(address), event),
      `Observed: ${formatUtcTime(observedAt)}`,
    ].join("\n"),
  );
