import { useState, useEffect, useCallback, useRef } from "react";
import { PacketMonitor } from "../lib/core/packet-monitor.ts";
import { StreamByteSource } from "../lib/stream/index.ts";
import type { SpacePacket } from "../lib/protocol/index.ts";
import { logger, LogEventType } from "../lib/utils/logger.ts";
import type { ReaderStep } from "../components/index.ts";
import {
  openInput,
  readerConfigFromOptions,
  updateStepStatus,
} from "../utils/app-utils.ts";
import type { DecodeOptions } from "../cli/types.ts";

const RECENT_LIMIT = 10;

export type DecodeStatus = "reading" | "done" | "error";

export function useDecodeStream(options: DecodeOptions) {
  const [status, setStatus] = useState<DecodeStatus>("reading");
  const [error, setError] = useState<string | null>(null);
  const [total, setTotal] = useState<number>(0);
  const [recent, setRecent] = useState<
    Array<{ index: number; packet: SpacePacket }>
  >([]);
  const [readerSteps, setReaderSteps] = useState<ReaderStep[]>([
    { id: "open", label: "Opening source", status: "active" },
    { id: "read", label: "Reading frames", status: "pending" },
    { id: "end", label: "Reached end of stream", status: "pending" },
  ]);
  const hasStarted = useRef(false);

  useEffect(() => {
    const unsubscribe = logger.onLog((entry) => {
      switch (entry.eventType) {
        case LogEventType.SOURCE_OPEN:
          setReaderSteps((prev) =>
            updateStepStatus(prev, "open", "complete", "read"),
          );
          break;

        case LogEventType.READER_START:
          setReaderSteps((prev) => updateStepStatus(prev, "read", "active"));
          break;

        case LogEventType.STREAM_END:
          setReaderSteps((prev) =>
            updateStepStatus(
              updateStepStatus(prev, "read", "complete", "end"),
              "end",
              "complete",
            ),
          );
          break;

        case LogEventType.READER_STOPPED:
          setReaderSteps((prev) => updateStepStatus(prev, "read", "complete"));
          break;
      }
    });

    return unsubscribe;
  }, []);

  const decode = useCallback(async () => {
    const monitor = new PacketMonitor(readerConfigFromOptions(options));

    try {
      const source = new StreamByteSource(openInput(options.file));

      await monitor.monitor(source, (packet, index) => {
        setTotal(index);
        setRecent((prev) => [...prev, { index, packet }].slice(-RECENT_LIMIT));

        if (options.limit !== undefined && index >= options.limit) {
          monitor.stop();
        }
      });

      setStatus("done");
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(errorMessage);
      setError(errorMessage);

      setReaderSteps((prev) => {
        const current = prev.find(
          (s) => s.status === "pending" || s.status === "active",
        );
        if (current) {
          return prev.map((step) =>
            step.id === current.id
              ? {
                  ...step,
                  status: "error",
                  error: err instanceof Error ? err.name : "Failed",
                }
              : step,
          );
        }
        return prev;
      });

      setStatus("error");
    }
  }, [options]);

  useEffect(() => {
    if (!hasStarted.current) {
      hasStarted.current = true;
      void decode();
    }
  }, [decode]);

  return {
    status,
    error,
    total,
    recent,
    readerSteps,
  };
}
