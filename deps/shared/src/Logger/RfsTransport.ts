import { finished } from "node:stream/promises";
import {
  type Options as RfsOptions,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import {
  type LogRecord,
  type LogRecordLevel,
  type LogTransport,
  logLevels,
} from "./Logger";

/**
 * 以 rotating-file-stream 寫出 JSON lines 的 transport。
 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;
  private readonly level: LogRecordLevel;

  constructor(options: {
    filename: string;
    level?: LogRecordLevel;
    rfs?: RfsOptions;
  }) {
    this.level = options.level ?? "debug";
    this.stream = createStream(options.filename, {
      size: "10M",
      interval: "1d",
      maxFiles: 14,
      ...options.rfs,
    });
  }

  write(record: LogRecord): void {
    if (logLevels.indexOf(record.level) < logLevels.indexOf(this.level)) return;
    const line = JSON.stringify({
      time: record.time,
      level: record.level,
      path: record.path.join(":"),
      event: record.event,
      msg: record.msg,
      ...record.context,
      err: record.err,
    });
    this.stream.write(`${line}\n`);
  }

  async [Symbol.asyncDispose]() {
    this.stream.end();
    await finished(this.stream);
  }
}
