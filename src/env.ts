/**
 * Environment initialization.
 *
 * Loads `.env` before any other module reads `process.env`
 * (e.g. `ENSEMBLE_LOG_LEVEL`). Import first from the CLI entry point.
 */
import dotenv from "dotenv";

dotenv.config({ quiet: true });
