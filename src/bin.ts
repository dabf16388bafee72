#!/usr/bin/env tsx
import { main } from "./cli";

process.exitCode = await main();
