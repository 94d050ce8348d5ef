#!/usr/bin/env node
import { run } from "./cli.js";

// ── Main ─────────────────────────────────────────────────

process.exitCode = run(process.argv.slice(2));
