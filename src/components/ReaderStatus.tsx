import { Box, Text } from "ink";
import type React from "react";
import { describeStep } from "../utils/app-utils.ts";

export interface ReaderStep {
  id: string;
  label: string;
  status: "pending" | "active" | "complete" | "error";
  error?: string;
}

interface ReaderStatusProps {
  steps: ReaderStep[];
  packets: number;
}

const MARKS: Record<ReaderStep["status"], { mark: string; color: string }> = {
  pending: { mark: "·", color: "gray" },
  active: { mark: "›", color: "cyan" },
  complete: { mark: "✓", color: "green" },
  error: { mark: "✗", color: "red" },
};

// Pending steps stay hidden until the reader reaches them
export const ReaderStatus: React.FC<ReaderStatusProps> = ({ steps, packets }) => {
  const visible = steps.filter((s) => s.status !== "pending");
  if (visible.length === 0) {
    return null;
  }

  return (
    <Box flexDirection="column" marginTop={1}>
      {visible.map((step) => {
        const { mark, color } = MARKS[step.status];
        return (
          <Text key={step.id} color={color}>
            {mark} {describeStep(step, packets)}
          </Text>
        );
      })}
    </Box>
  );
};
