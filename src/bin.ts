#!/usr/bin/env node
/**
 * ensemble-agg CLI entry point.
 *
 * env.js must be the first import so that environment variables are loaded
 * before any other module reads them.
 */
import "./env.js";

import { program } from "./cli/index.js";

program.parse();
