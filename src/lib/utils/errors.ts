/**
 * Base error class for all space packet errors
 */
export class SpacePacketError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SpacePacketError";
    Object.setPrototypeOf(this, SpacePacketError.prototype);
  }
}

/**
 * Stage of the frame being read when a framing error occurred
 */
export type FramePhase = "header" | "body";

/**
 * Error thrown when a frame's length disagrees with its primary header
 */
export class FramingError extends SpacePacketError {
  constructor(message: string) {
    super(message);
    this.name = "FramingError";
    Object.setPrototypeOf(this, FramingError.prototype);
  }
}

/**
 * Error thrown when fewer bytes are available than the frame announces.
 *
 * Raised for a partial header (1 to 5 bytes before end of stream), a short
 * body, or a data field too small for the checksum and secondary header.
 */
export class TruncatedFrameError extends FramingError {
  public readonly phase: FramePhase;
  public readonly expected: number;
  public readonly received: number;

  constructor(phase: FramePhase, expected: number, received: number) {
    super(
      `Truncated frame ${phase}: expected ${expected} bytes, got ${received}`,
    );
    this.name = "TruncatedFrameError";
    this.phase = phase;
    this.expected = expected;
    this.received = received;
    Object.setPrototypeOf(this, TruncatedFrameError.prototype);
  }
}

/**
 * Error thrown when a decoded header field is outside its defined domain
 */
export class MalformedHeaderError extends SpacePacketError {
  public readonly field: string;
  public readonly value: number;

  constructor(field: string, value: number) {
    super(`Malformed primary header: invalid ${field} value ${value}`);
    this.name = "MalformedHeaderError";
    this.field = field;
    this.value = value;
    Object.setPrototypeOf(this, MalformedHeaderError.prototype);
  }
}

/**
 * Error thrown when a frame fails checksum validation
 */
export class ChecksumMismatchError extends SpacePacketError {
  /** Checksum carried in the trailing two bytes of the frame */
  public readonly expected: number;

  constructor(expected: number) {
    super(
      `Checksum validation failed for frame with checksum 0x${expected.toString(16).padStart(4, "0")}`,
    );
    this.name = "ChecksumMismatchError";
    this.expected = expected;
    Object.setPrototypeOf(this, ChecksumMismatchError.prototype);
  }
}

/**
 * Error thrown when a packet cannot be encoded from the given field values
 */
export class InvalidFieldError extends SpacePacketError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidFieldError";
    Object.setPrototypeOf(this, InvalidFieldError.prototype);
  }
}

/**
 * Error thrown when publishing to a channel that has been closed
 */
export class ChannelClosedError extends SpacePacketError {
  constructor(message: string = "Channel is closed") {
    super(message);
    this.name = "ChannelClosedError";
    Object.setPrototypeOf(this, ChannelClosedError.prototype);
  }
}

/**
 * Error thrown when the underlying byte source fails
 */
export class SourceReadError extends SpacePacketError {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = "SourceReadError";
    Object.setPrototypeOf(this, SourceReadError.prototype);
  }
}
