import { Command } from "commander";
import { LogLevel, logger, parseLogLevel } from "../lib/utils/logger.ts";
import {
  CHANNEL_CAPACITY,
  PacketType,
  SequenceFlags,
  SpacePacket,
} from "../lib/protocol/index.ts";
import { PacketMonitor } from "../lib/core/packet-monitor.ts";
import { BufferByteSource, StreamByteSource } from "../lib/stream/index.ts";
import { formatPacket, packetToJSON } from "../lib/utils/format.ts";
import {
  openInput,
  parseHex,
  parseInteger,
  parsePacketType,
  parseSequenceFlags,
  readerConfigFromOptions,
} from "../utils/app-utils.ts";
import type {
  DecodeOptions,
  EncodeOptions,
  GlobalOptions,
  InspectOptions,
} from "./types.ts";

function fail(error: unknown): never {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
}

export function setupCLI() {
  const program = new Command();

  program
    .name("spacepktctl")
    .description("Decode and build space packet streams")
    .version("1.0.0")
    .option("-v, --verbose", "Show detailed logs including every frame", false)
    .option("--log-level <level>", "Minimum log level (debug, info, warning, error)");

  program.hook("preAction", () => {
    const { verbose, logLevel } = program.opts<GlobalOptions>();

    if (logLevel !== undefined) {
      const level = parseLogLevel(logLevel);
      if (level === null) {
        console.error(`Error: Unknown log level "${logLevel}"`);
        process.exit(1);
      }
      logger.setLevel(level);
    }

    if (verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }
  });

  program
    .command("decode [file]")
    .description("Decode packets from a file, or from stdin when no file is given")
    .option("--json", "Write one JSON object per packet instead of the live view", false)
    .option(
      "--capacity <n>",
      "Packets buffered between reader and output",
      parseInteger,
      CHANNEL_CAPACITY,
    )
    .option("--limit <n>", "Stop after this many packets", parseInteger)
    .action(async (file: string | undefined, options: DecodeOptions) => {
      const decodeOptions: DecodeOptions = { ...options, file };

      if (!decodeOptions.json) {
        const { DecodeApp } = await import("../components/DecodeApp.tsx");
        const { render } = await import("ink");
        render(<DecodeApp options={decodeOptions} />);
        return;
      }

      const monitor = new PacketMonitor(readerConfigFromOptions(decodeOptions));
      process.once("SIGINT", () => monitor.stop());

      try {
        const source = new StreamByteSource(openInput(decodeOptions.file));
        await monitor.monitor(source, (packet, index) => {
          process.stdout.write(`${JSON.stringify(packetToJSON(packet))}\n`);
          if (decodeOptions.limit !== undefined && index >= decodeOptions.limit) {
            monitor.stop();
          }
        });
      } catch (error) {
        fail(error);
      }

      // stdin may still be open after a stop
      process.exit(0);
    });

  program
    .command("inspect <hex>")
    .description("Decode the frames contained in a hex string")
    .option("--json", "Print packets as JSON", false)
    .action(async (hex: string, options: InspectOptions) => {
      try {
        const source = new BufferByteSource(parseHex(hex));
        const count = await new PacketMonitor().monitor(source, (packet) => {
          console.log(
            options.json
              ? JSON.stringify(packetToJSON(packet), null, 2)
              : formatPacket(packet),
          );
        });
        logger.info(`Inspected ${count} packet(s)`);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command("encode")
    .description("Build a packet from field values and print it as hex")
    .requiredOption("--apid <apid>", "Application process identifier (0-2047)", parseInteger)
    .option("--type <type>", "Packet type: tm or tc", parsePacketType, PacketType.TELEMETRY)
    .option(
      "--sequence-flags <flags>",
      "continuation, first, last or unsegmented",
      parseSequenceFlags,
      SequenceFlags.UNSEGMENTED,
    )
    .option("--sequence-counter <n>", "Sequence counter (0-16383)", parseInteger, 0)
    .option("--packet-version <n>", "Packet version number (0-7)", parseInteger, 0)
    .option("--time-week <n>", "Secondary header week", parseInteger)
    .option("--time-ms <n>", "Secondary header milliseconds", parseInteger)
    .option("--data <hex>", "User data as hex", parseHex)
    .option("--raw", "Write the binary frame to stdout", false)
    .action((options: EncodeOptions) => {
      const hasSecondaryHeader =
        options.timeWeek !== undefined || options.timeMs !== undefined;

      try {
        const packet = SpacePacket.compose({
          versionNumber: options.packetVersion,
          packetType: options.type,
          apid: options.apid,
          sequenceFlags: options.sequenceFlags,
          sequenceCounter: options.sequenceCounter,
          secondaryHeader: hasSecondaryHeader
            ? { timeWeek: options.timeWeek ?? 0, timeMs: options.timeMs ?? 0 }
            : null,
          userData: options.data ?? null,
        });
        const frame = packet.intoBuffer();

        if (options.raw) {
          process.stdout.write(frame);
        } else {
          console.log(frame.toString("hex"));
        }
      } catch (error) {
        fail(error);
      }
    });

  return program;
}
