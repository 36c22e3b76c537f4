import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import { InvalidArgumentError } from "commander";
import type { ReaderConfig } from "../lib/protocol/index.ts";
import { PacketType, SequenceFlags } from "../lib/protocol/index.ts";
import { logger, LogEventType } from "../lib/utils/logger.ts";
import type { ReaderStep } from "../components/index.ts";
import type { DecodeOptions } from "../cli/types.ts";

const PACKET_TYPE_NAMES = new Map<string, PacketType>([
  ["tm", PacketType.TELEMETRY],
  ["telemetry", PacketType.TELEMETRY],
  ["0", PacketType.TELEMETRY],
  ["tc", PacketType.TELECOMMAND],
  ["telecommand", PacketType.TELECOMMAND],
  ["1", PacketType.TELECOMMAND],
]);

const SEQUENCE_FLAG_NAMES = new Map<string, SequenceFlags>([
  ["continuation", SequenceFlags.CONTINUATION],
  ["first", SequenceFlags.FIRST_SEGMENT],
  ["last", SequenceFlags.LAST_SEGMENT],
  ["unsegmented", SequenceFlags.UNSEGMENTED],
  ["0", SequenceFlags.CONTINUATION],
  ["1", SequenceFlags.FIRST_SEGMENT],
  ["2", SequenceFlags.LAST_SEGMENT],
  ["3", SequenceFlags.UNSEGMENTED],
]);

/**
 * Parse hex text such as "08 73 c1", "0x0873c1" or "08:73:C1" into bytes
 * @throws InvalidArgumentError on odd length or non-hex characters
 */
export function parseHex(text: string): Buffer {
  const digits = text.replace(/^0x/i, "").replace(/[\s:]/g, "");

  if (!/^[0-9a-fA-F]*$/.test(digits)) {
    throw new InvalidArgumentError(`Not a hex string: "${text}"`);
  }
  if (digits.length % 2 !== 0) {
    throw new InvalidArgumentError(
      `Hex string has an odd number of digits (${digits.length})`,
    );
  }

  return Buffer.from(digits, "hex");
}

/**
 * Parse a non-negative decimal or 0x-prefixed hex integer
 */
export function parseInteger(value: string): number {
  const trimmed = value.trim();
  let parsed = Number.NaN;

  if (/^0x[0-9a-f]+$/i.test(trimmed)) {
    parsed = Number.parseInt(trimmed.slice(2), 16);
  } else if (/^\d+$/.test(trimmed)) {
    parsed = Number.parseInt(trimmed, 10);
  }

  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`Not a non-negative integer: "${value}"`);
  }
  return parsed;
}

export function parsePacketType(value: string): PacketType {
  const type = PACKET_TYPE_NAMES.get(value.trim().toLowerCase());
  if (type === undefined) {
    throw new InvalidArgumentError(`Unknown packet type "${value}" (use tm or tc)`);
  }
  return type;
}

export function parseSequenceFlags(value: string): SequenceFlags {
  const flags = SEQUENCE_FLAG_NAMES.get(value.trim().toLowerCase());
  if (flags === undefined) {
    throw new InvalidArgumentError(
      `Unknown sequence flags "${value}" (use continuation, first, last, unsegmented or 0-3)`,
    );
  }
  return flags;
}

export function updateStepStatus(
  steps: ReaderStep[],
  stepId: string,
  status: "pending" | "active" | "complete" | "error",
  nextStepId?: string,
): ReaderStep[] {
  return steps.map((step) => {
    if (step.id === stepId) return { ...step, status };
    if (nextStepId && step.id === nextStepId)
      return { ...step, status: "active" };
    return step;
  });
}

/**
 * One-line text for a reader step; the read step carries the packet count
 */
export function describeStep(step: ReaderStep, packets: number): string {
  const count = `${packets} packet${packets === 1 ? "" : "s"}`;
  switch (step.status) {
    case "error":
      return step.error
        ? `${step.label} failed: ${step.error}`
        : `${step.label} failed`;
    case "active":
      return step.id === "read" ? `${step.label} (${count} so far)` : `${step.label}...`;
    case "complete":
      return step.id === "read" ? `${step.label} (${count})` : step.label;
    case "pending":
      return step.label;
  }
}

/**
 * Open the decode input: a file path, or stdin when none (or "-") is given
 */
export function openInput(file?: string): Readable {
  if (file && file !== "-") {
    logger.info(`Reading frames from ${file}`, LogEventType.SOURCE_OPEN, { file });
    return createReadStream(file);
  }
  logger.info("Reading frames from stdin", LogEventType.SOURCE_OPEN);
  return process.stdin;
}

export function readerConfigFromOptions(
  options: Pick<DecodeOptions, "capacity">,
): Partial<ReaderConfig> {
  return options.capacity !== undefined
    ? { channelCapacity: options.capacity }
    : {};
}
