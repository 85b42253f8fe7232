import { config as loadDotenv } from "dotenv";
import { expand } from "dotenv-expand";
import { resetMonitoringConfig } from "./config/monitoring";

let loaded = false;

/**
 * Loads `.env` (with variable expansion) into process.env once. Existing
 * variables win over the file.
 */
export const loadEnvironment = (path?: string): void => {
  if (loaded) {
    return;
  }
  expand(loadDotenv(path ? { path } : undefined));
  resetMonitoringConfig();
  loaded = true;
};
