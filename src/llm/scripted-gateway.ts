/**
 * 按脚本回放的模型网关，供测试使用
 * 第 n 次 stream() 调用回放第 n 段脚本，并记录提交的对话
 */

import { setTimeout as sleep } from "node:timers/promises";
import { ModelStreamError } from "../errors.js";
import type { PromptSet } from "../types.js";
import type { ModelGateway, StreamOptions } from "./gateway.js";

export interface Script {
  fragments: readonly string[];
  /** 输出完片段后抛出的错误信息 */
  failWith?: string;
  /** 每个片段之前等待的毫秒数 */
  delayMs?: number;
}

export interface RecordedCall {
  turns: PromptSet;
  signal?: AbortSignal;
}

export class ScriptedGateway implements ModelGateway {
  readonly calls: RecordedCall[] = [];
  /** 已结束（正常完成、失败或被放弃）的调用数 */
  released = 0;
  private readonly scripts: readonly Script[];

  constructor(scripts: ReadonlyArray<Script | readonly string[]>) {
    this.scripts = scripts.map((s) => ("fragments" in s ? s : { fragments: s }));
  }

  async *stream(turns: PromptSet, options: StreamOptions = {}): AsyncGenerator<string> {
    const index = this.calls.length;
    this.calls.push({ turns, signal: options.signal });
    const script = this.scripts[index];
    try {
      if (!script) throw new ModelStreamError(`没有第 ${index + 1} 次调用的脚本`);
      for (const fragment of script.fragments) {
        if (script.delayMs) await sleep(script.delayMs);
        yield fragment;
      }
      if (script.failWith !== undefined) throw new ModelStreamError(script.failWith);
    } finally {
      this.released++;
    }
  }
}
