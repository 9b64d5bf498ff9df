import kleur from "kleur";

import {
  type LogContext,
  type LogLevel,
  type LogMethod,
  type LogRecord,
  type LogRecordLevel,
  type LogTransport,
  type Logger,
  type SerializedError,
  type TemplateLog,
  logLevels,
} from "./Logger";

export type EmojiMap = Partial<Record<string, string>>;

const RESERVED_KEYS = new Set(["event", "emoji", "error"]);

function serializeError(error: unknown): SerializedError | undefined {
  if (error === undefined) return undefined;
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "NonError", message: String(error) };
}

type CallSiteAnchor = (...args: never[]) => unknown;

/** error 等級沒有附帶 error 時，以呼叫 logger 的位置作為 stack */
function callSiteError(message: string, caller: CallSiteAnchor): SerializedError {
  const holder = new Error(message);
  Error.captureStackTrace(holder, caller);
  return { name: "Error", message, stack: holder.stack };
}

function stringifyContext(context: Record<string, unknown>): string {
  const keys = Object.keys(context);
  if (keys.length === 0) return "";
  try {
    return JSON.stringify(context);
  } catch {
    return `{${keys.join(",")}}`;
  }
}

/**
 * 輸出到 console 的 logger，並將每筆紀錄送往已掛載的 transport。
 * console 只輸出 level 以上的紀錄；transport 收到全部紀錄，自行決定是否寫出。
 */
export class LoggerConsole implements Logger {
  readonly trace: LogMethod = this.buildMethod("trace");
  readonly debug: LogMethod = this.buildMethod("debug");
  readonly info: LogMethod = this.buildMethod("info");
  readonly warn: LogMethod = this.buildMethod("warn");
  readonly error: LogMethod = this.buildMethod("error");

  constructor(
    private readonly level: LogLevel,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = {},
    private readonly transports: LogTransport[] = []
  ) {}

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  private buildMethod(level: LogRecordLevel): LogMethod {
    function method(message: string): void;
    function method(context: LogContext, message: string): void;
    function method(context?: LogContext): TemplateLog;
    function method(
      contextOrMessage?: LogContext | string,
      message?: string
    ): TemplateLog | void {
      if (typeof contextOrMessage === "string") {
        write(level, {}, contextOrMessage, contextOrMessage, method);
        return;
      }
      const context = contextOrMessage ?? {};
      if (message !== undefined) {
        write(level, context, message, message, method);
        return;
      }
      const template: TemplateLog = (strings, ...values) => {
        const templateContext: LogContext = { ...context };
        let plain = "";
        let colored = "";
        strings.forEach((part, index) => {
          plain += part;
          colored += part;
          if (index < values.length) {
            const value = values[index];
            templateContext[`__${index}`] = value;
            plain += String(value);
            colored += kleur.green(String(value));
          }
        });
        write(level, templateContext, plain, colored, template);
      };
      return template;
    }
    const write = (
      level: LogRecordLevel,
      context: LogContext,
      plain: string,
      colored: string,
      caller: CallSiteAnchor
    ) => this.write(level, context, plain, colored, caller);
    return method;
  }

  private resolveEmoji(level: LogRecordLevel, context: LogContext): string {
    if (context.emoji) return context.emoji;
    const byEvent = context.event ? this.emojiMap[context.event] : undefined;
    if (byEvent) return byEvent;
    const byLevel = this.emojiMap[level];
    if ((level === "warn" || level === "error") && byLevel) return byLevel;
    return this.context.emoji ?? byLevel ?? "";
  }

  private write(
    level: LogRecordLevel,
    context: LogContext,
    plain: string,
    colored: string,
    caller: CallSiteAnchor
  ) {
    const merged: LogContext = { ...this.context, ...context };
    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(merged)) {
      if (!RESERVED_KEYS.has(key)) extra[key] = value;
    }
    const event = context.event;
    const err =
      serializeError(merged.error) ??
      (level === "error" ? callSiteError(plain, caller) : undefined);

    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path,
      event,
      msg: plain,
      context: extra,
      err,
    };
    for (const transport of this.transports) transport.write(record);

    if (logLevels.indexOf(level) < logLevels.indexOf(this.level)) return;

    const emoji = this.resolveEmoji(level, context);
    const label = [...this.path, event ?? level].join(":");
    const line = [emoji, `${label}: ${colored}`, stringifyContext(extra)]
      .filter((part) => part !== "")
      .join(" ");

    if (level === "error") {
      console.error(err?.stack ? `${line}\n${err.stack}` : line);
    } else if (level === "warn") {
      console.warn(line);
    } else if (level === "debug" || level === "trace") {
      console.debug(line);
    } else {
      console.info(line);
    }
  }
}
