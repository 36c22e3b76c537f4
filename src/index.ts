#!/usr/bin/env tsx
import { setupCLI } from "./cli/index.tsx";

const program = setupCLI();
await program.parseAsync(process.argv);
