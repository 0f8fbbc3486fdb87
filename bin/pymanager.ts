#!/usr/bin/env tsx
import { run } from "../src/main.ts";

process.exit(await run(process.argv.slice(2)));
