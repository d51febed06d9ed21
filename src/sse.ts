/**
 * SSE 传输
 * 状态：init → prepared（响应头已提交）→ streaming → errored → closed
 * 响应头一旦提交就只能通过 error 事件报告错误，且无论成败都以一个 end 事件收尾
 */

import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { SseEndPayload, SseErrorPayload, SseEventName, SseResponsePayload } from "./types.js";

export type SseState = "init" | "prepared" | "streaming" | "errored" | "closed";

type SsePayload = SseResponsePayload | SseErrorPayload | SseEndPayload;

/** 单个 SSE 帧；JSON.stringify 不转义非 ASCII 字符 */
export function formatSseFrame(event: SseEventName, data: SsePayload): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

/** SSE 所需的最小响应接口，express Response 满足此接口 */
export interface SseTarget {
  readonly destroyed: boolean;
  readonly writableEnded: boolean;
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
  write(chunk: string): boolean;
  end(): unknown;
  /** 存在压缩层时才有的 flush */
  flush?: () => void;
}

export class SseWriter {
  private readonly res: SseTarget;
  private current: SseState = "init";

  constructor(res: SseTarget) {
    this.res = res;
  }

  get state(): SseState {
    return this.current;
  }

  /** 客户端已断开，后续写入没有意义 */
  get disconnected(): boolean {
    return this.res.destroyed || this.res.writableEnded;
  }

  /** 提交响应头；之后响应不可再转为普通 JSON */
  open(): void {
    if (this.current !== "init") throw new Error(`SSE 响应头已提交（当前状态 ${this.current}）`);
    this.res.statusCode = 200;
    this.res.setHeader("Content-Type", "text/event-stream");
    this.res.setHeader("Cache-Control", "no-cache");
    this.res.setHeader("Connection", "keep-alive");
    this.res.flushHeaders();
    this.current = "prepared";
  }

  /** 写入一帧并立即 flush；连接已断开时返回 false */
  send(event: SseEventName, data: SsePayload): boolean {
    if (this.current === "init" || this.current === "closed") {
      throw new Error(`SSE 状态 ${this.current} 下不能写入 ${event} 事件`);
    }
    if (this.disconnected) return false;
    this.res.write(formatSseFrame(event, data));
    this.res.flush?.();
    if (event === "data" && this.current === "prepared") this.current = "streaming";
    if (event === "error") this.current = "errored";
    return true;
  }

  close(): void {
    if (this.current === "closed") return;
    if (!this.res.writableEnded) this.res.end();
    this.current = "closed";
  }
}

export interface RelayOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

export interface RelayResult {
  fragments: number;
  /** 流中途失败时的错误描述 */
  error?: string;
  /** 客户端断开导致提前停止 */
  aborted: boolean;
}

/**
 * 逐个拉取片段并写成 data 事件，顺序与产出顺序一致
 * 中途异常写一个 error 事件；最后总是写 end 事件并关闭
 */
export async function relayToSse(
  writer: SseWriter,
  fragments: AsyncIterable<string>,
  options: RelayOptions = {}
): Promise<RelayResult> {
  const log = options.logger ?? silentLogger;
  const result: RelayResult = { fragments: 0, aborted: false };

  writer.open();
  try {
    for await (const message of fragments) {
      // 停止拉取即触发上游 return()，释放模型连接
      if (options.signal?.aborted || !writer.send("data", { action: "response", message })) {
        result.aborted = true;
        break;
      }
      result.fragments++;
    }
  } catch (e) {
    if (options.signal?.aborted || writer.disconnected) {
      result.aborted = true;
      log.info({ fragments: result.fragments }, "客户端已断开，停止输出");
    } else {
      result.error = errorMessage(e);
      log.error({ err: e, fragments: result.fragments }, "流式输出中途失败");
      writer.send("error", { action: "error", message: result.error });
    }
  }

  writer.send("end", {});
  writer.close();
  return result;
}
