/**
 * 菜单读取：本地文本/CSV 文件，读取后缓存
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { ConfigError, errorMessage } from "./errors.js";

const cache = new Map<string, string>();

export function loadMenu(path: string): string {
  const full = resolve(path);
  const cached = cache.get(full);
  if (cached !== undefined) return cached;
  let text: string;
  try {
    text = readFileSync(full, "utf-8");
  } catch (e) {
    throw new ConfigError(`无法读取菜单文件 ${full}: ${errorMessage(e)}`);
  }
  cache.set(full, text);
  return text;
}

/** 清除缓存（菜单更新后重新读取） */
export function clearMenuCache(): void {
  cache.clear();
}
