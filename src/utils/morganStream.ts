/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * morganStream.ts: Morgan logging stream adapter for Reelcast.
 */
import type { StreamOptions } from "morgan";
import df from "dateformat";
import { isConsoleLogging } from "./logger.js";
import { writeLogEntry } from "./fileLogger.js";

/**
 * Creates a Morgan stream that routes HTTP request logs to the same sink as application logs. In console mode the line gets the same timestamp prefix that
 * console-stamp applies to everything else; in file mode the file logger adds its own.
 * @returns StreamOptions object for Morgan configuration.
 */
export function createMorganStream(): StreamOptions {

  return {

    write: (message: string): void => {

      // Morgan terminates every line with a newline. Both sinks add their own.
      const trimmedMessage = message.trim();

      if(isConsoleLogging()) {

        // eslint-disable-next-line no-console
        console.log([ "[", df(new Date(), "yyyy/mm/dd HH:MM:ss.l"), "] ", trimmedMessage ].join(""));
      } else {

        writeLogEntry("info", trimmedMessage);
      }
    }
  };
}
