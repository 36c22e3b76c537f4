import type { ChecksumAccumulator, ReaderConfig } from "../protocol/index.ts";
import {
  DEFAULT_READER_CONFIG,
  PRIMARY_HEADER_SIZE,
  PrimaryHeaderCodec,
  SpacePacket,
} from "../protocol/index.ts";
import type { ByteSource } from "./byte-source.ts";
import { PacketChannel } from "./packet-channel.ts";
import {
  SourceReadError,
  SpacePacketError,
  TruncatedFrameError,
} from "../utils/errors.ts";
import { logger, LogEventType } from "../utils/logger.ts";

/**
 * Where the reader is in the current frame
 *
 * ```
 * AWAITING_HEADER -> AWAITING_BODY -> EMIT -> AWAITING_HEADER
 *        |                                         |
 *        +-------------> STOPPED <-----------------+
 * ```
 */
export enum ReaderState {
  AWAITING_HEADER = "awaiting_header",
  AWAITING_BODY = "awaiting_body",
  EMIT = "emit",
  STOPPED = "stopped",
}

/**
 * Splits a byte source into space packets and publishes them on a channel
 *
 * Each frame is read as a 6-byte primary header followed by the
 * `dataLength + 1` bytes it announces. Every frame-level failure aborts the
 * run; there is no resynchronisation. The channel is closed whenever the run
 * ends, so consumers always observe end-of-stream.
 */
export class FrameReader {
  private state: ReaderState = ReaderState.AWAITING_HEADER;
  private running = false;
  private stopRequested = false;
  private emitted = 0;

  constructor(
    private readonly source: ByteSource,
    private readonly channel: PacketChannel<SpacePacket>,
    private readonly accumulator: ChecksumAccumulator = DEFAULT_READER_CONFIG.accumulator,
  ) {}

  get currentState(): ReaderState {
    return this.state;
  }

  /** Packets published so far */
  get packetsEmitted(): number {
    return this.emitted;
  }

  /**
   * Read frames until the source ends or the reader is stopped
   * @returns Number of packets published
   * @throws TruncatedFrameError if the source ends inside a frame
   * @throws ChecksumMismatchError if a frame fails validation
   * @throws SourceReadError if the source fails
   * @throws ChannelClosedError if the consumers closed the channel
   */
  public async run(): Promise<number> {
    if (this.running) {
      throw new SpacePacketError("Frame reader is already running");
    }
    if (this.stopRequested || this.state === ReaderState.STOPPED) {
      this.state = ReaderState.STOPPED;
      this.channel.close();
      return this.emitted;
    }

    this.running = true;
    logger.info("Frame reader started", LogEventType.READER_START);

    try {
      while (!this.stopRequested) {
        this.state = ReaderState.AWAITING_HEADER;
        const header = await this.readExactly(PRIMARY_HEADER_SIZE);

        if (this.stopRequested) break;

        if (header.length === 0) {
          logger.info(
            `Source ended after ${this.emitted} packet(s)`,
            LogEventType.STREAM_END,
            { packets: this.emitted },
          );
          break;
        }
        if (header.length < PRIMARY_HEADER_SIZE) {
          throw new TruncatedFrameError("header", PRIMARY_HEADER_SIZE, header.length);
        }

        const bodySize = PrimaryHeaderCodec.readDataLength(header) + 1;
        logger.debug(
          `Header read, expecting ${bodySize} data field bytes`,
          LogEventType.HEADER_READ,
          { header: header.toString("hex"), bodySize },
        );

        this.state = ReaderState.AWAITING_BODY;
        const body = await this.readExactly(bodySize);
        if (body.length < bodySize) {
          throw new TruncatedFrameError("body", bodySize, body.length);
        }
        logger.debug(`Data field read (${body.length} bytes)`, LogEventType.BODY_READ);

        this.state = ReaderState.EMIT;
        const packet = SpacePacket.fromBuffers(header, body, this.accumulator);
        await this.channel.send(packet);
        this.emitted++;

        logger.debug(
          `Packet ${this.emitted} decoded: APID ${packet.primaryHeader.apid}, counter ${packet.primaryHeader.sequenceCounter}`,
          LogEventType.PACKET_DECODED,
          packet,
        );
      }

      if (this.stopRequested) {
        logger.info(
          `Frame reader stopped after ${this.emitted} packet(s)`,
          LogEventType.READER_STOPPED,
          { packets: this.emitted },
        );
      }
      return this.emitted;
    } finally {
      this.state = ReaderState.STOPPED;
      this.running = false;
      this.channel.close();
    }
  }

  /**
   * Request shutdown at the next frame boundary
   *
   * A frame whose data field is being read is still completed and published.
   * When the reader is waiting for a header, the channel is closed at once.
   */
  public stop(): void {
    this.stopRequested = true;

    if (!this.running) {
      this.state = ReaderState.STOPPED;
      this.channel.close();
    } else if (this.state === ReaderState.AWAITING_HEADER) {
      this.channel.close();
    }
  }

  private async readExactly(size: number): Promise<Buffer> {
    try {
      return await this.source.read(size);
    } catch (error) {
      if (error instanceof SourceReadError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new SourceReadError(`Failed to read from source: ${message}`, error);
    }
  }
}

/**
 * Build a reader together with the channel it publishes on
 */
export function createFrameReader(
  source: ByteSource,
  config: Partial<ReaderConfig> = {},
): { reader: FrameReader; channel: PacketChannel<SpacePacket> } {
  const { channelCapacity, accumulator } = { ...DEFAULT_READER_CONFIG, ...config };
  const channel = new PacketChannel<SpacePacket>(channelCapacity);
  const reader = new FrameReader(source, channel, accumulator);
  return { reader, channel };
}
