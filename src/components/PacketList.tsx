import { Box, Text } from "ink";
import type React from "react";
import type { SpacePacket } from "../lib/protocol/index.ts";
import { PacketType } from "../lib/protocol/index.ts";
import { formatPacketSummary } from "../lib/utils/format.ts";

interface PacketListProps {
  packets: ReadonlyArray<{ index: number; packet: SpacePacket }>;
  total: number;
}

export const PacketList: React.FC<PacketListProps> = ({ packets, total }) => {
  return (
    <Box flexDirection="column" marginTop={1}>
      <Text bold>
        Packets decoded: <Text color="green">{total}</Text>
      </Text>
      {packets.map(({ index, packet }) => (
        <Box key={index}>
          <Text color="dim">{String(index).padStart(6, " ")} </Text>
          <Text
            color={
              packet.primaryHeader.packetType === PacketType.TELECOMMAND
                ? "yellow"
                : "cyan"
            }
          >
            {formatPacketSummary(packet)}
          </Text>
        </Box>
      ))}
    </Box>
  );
};
