/**
 * @fileoverview File locations under the configured data directory.
 *
 * Layout:
 * - <data_dir>/reply-drafter.db
 * - <data_dir>/logs/reply-drafter.log
 */

import * as Path from "node:path";

export const getDatabasePath = (dataDir: string): string =>
	Path.join(dataDir, "reply-drafter.db");

export const getLogsDirectory = (dataDir: string): string => Path.join(dataDir, "logs");

export const getLogFilePath = (dataDir: string): string =>
	Path.join(getLogsDirectory(dataDir), "reply-drafter.log");
