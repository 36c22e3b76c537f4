import type { ReaderConfig } from "../protocol/index.ts";
import { DEFAULT_READER_CONFIG, packetTypeLabel } from "../protocol/index.ts";
import type { SpacePacket } from "../protocol/index.ts";
import type { ByteSource, FrameReader, PacketChannel } from "../stream/index.ts";
import { createFrameReader } from "../stream/index.ts";
import { logger, LogEventType } from "../utils/logger.ts";

export type PacketHandler = (
  packet: SpacePacket,
  index: number,
) => void | Promise<void>;

/**
 * Runs a frame reader over a source and hands every decoded packet to a
 * consumer, logging each one as it goes
 */
export class PacketMonitor {
  private readonly config: ReaderConfig;
  private reader: FrameReader | null = null;
  private stopRequested = false;

  constructor(config: Partial<ReaderConfig> = {}) {
    this.config = { ...DEFAULT_READER_CONFIG, ...config };
  }

  /**
   * Decode the source until it ends, fails or the monitor is stopped
   *
   * If the handler throws, the channel is closed (the reader aborts on its
   * next publish) and the handler's error is rethrown.
   *
   * @param source Byte source to decode
   * @param onPacket Called once per packet, in stream order
   * @returns Number of packets handed to `onPacket`
   */
  public async monitor(
    source: ByteSource,
    onPacket: PacketHandler = () => undefined,
  ): Promise<number> {
    const { reader, channel } = createFrameReader(source, this.config);
    this.reader = reader;
    this.stopRequested = false;

    const running = reader.run();

    try {
      let consumed: number;
      try {
        consumed = await this.consume(channel, onPacket);
      } catch (error) {
        channel.close();
        this.detach(running);
        throw error;
      }

      // The reader may still be parked on a read that never completes
      if (this.stopRequested) {
        channel.close();
        this.detach(running);
        return consumed;
      }

      await running;
      return consumed;
    } finally {
      this.reader = null;
    }
  }

  /**
   * Stop at the next frame boundary. Packets still queued are not delivered.
   */
  public stop(): void {
    this.stopRequested = true;
    this.reader?.stop();
  }

  private async consume(
    channel: PacketChannel<SpacePacket>,
    onPacket: PacketHandler,
  ): Promise<number> {
    let consumed = 0;

    for await (const packet of channel) {
      consumed++;
      const { apid, packetType, sequenceCounter } = packet.primaryHeader;
      logger.info(
        `Packet ${consumed}: APID ${apid} ${packetTypeLabel(packetType)} #${sequenceCounter}`,
        LogEventType.PACKET_CONSUMED,
        packet,
      );
      await onPacket(packet, consumed);
      if (this.stopRequested) break;
    }

    return consumed;
  }

  private detach(running: Promise<number>): void {
    void running.then(
      (count) => logger.debug(`Detached reader finished after ${count} packet(s)`),
      (error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        logger.debug(`Detached reader ended: ${message}`);
      },
    );
  }
}
