import React, { useEffect } from "react";
import { Box, Text, useApp } from "ink";
import Spinner from "ink-spinner";
import { Header, PacketList, ReaderStatus } from "./index.ts";
import { useDecodeStream } from "../hooks/useDecodeStream.ts";
import type { DecodeOptions } from "../cli/types.ts";

export interface DecodeAppProps {
  options: DecodeOptions;
}

export const DecodeApp: React.FC<DecodeAppProps> = ({ options }) => {
  const { exit } = useApp();
  const { status, error, total, recent, readerSteps } =
    useDecodeStream(options);

  // Exit the app when done
  useEffect(() => {
    if (status === "done" || status === "error") {
      // Give time for the final render, then exit
      const timer = setTimeout(() => {
        exit();
        // stdin may still be open after a stop
        process.exit(status === "error" ? 1 : 0);
      }, 100);
      return () => clearTimeout(timer);
    }
  }, [status, exit]);

  return (
    <Box flexDirection="column" padding={1}>
      <Header />

      {status === "reading" && (
        <Box flexDirection="column">
          <Box>
            <Text color="cyan">
              <Spinner type="dots" />
            </Text>
            <Text color="cyan" bold>
              {" "}
              Decoding {options.file ?? "stdin"}...
            </Text>
          </Box>
          <ReaderStatus steps={readerSteps} packets={total} />
        </Box>
      )}

      {status === "done" && (
        <Box>
          <Text color="green" bold>
            ✓ Stream decoded
          </Text>
        </Box>
      )}

      {status === "error" && (
        <Box flexDirection="column">
          <Box>
            <Text color="red" bold>
              ✗ Decode Error
            </Text>
          </Box>
          <Box marginTop={1}>
            <Text color="gray">{error}</Text>
          </Box>
          <ReaderStatus steps={readerSteps} packets={total} />
        </Box>
      )}

      <PacketList packets={recent} total={total} />
    </Box>
  );
};
