import type { StringReplaceParams } from '../model.js';
import { renderString } from '../template.js';
import { ConfigError } from '../types.js';
import { walkAndModify } from '../walk-modify.js';
import type { StepContext } from './context.js';

const encoder = new TextEncoder();

/**
 * Replace occurrences of `from` in `buf` with `to`, left to right, at most
 * `count` times (every occurrence when `count` is negative). Returns `buf`
 * itself when nothing matched.
 */
export function replaceBytes(buf: Uint8Array, from: Uint8Array, to: Uint8Array, count = -1): Uint8Array {
  const src = Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength);
  const parts: Uint8Array[] = [];
  let start = 0;
  let n = 0;
  while (count < 0 || n < count) {
    const idx = src.indexOf(from, start);
    if (idx < 0) break;
    parts.push(src.subarray(start, idx), to);
    start = idx + from.length;
    n++;
  }
  if (n === 0) return buf;
  parts.push(src.subarray(start));
  return Buffer.concat(parts);
}

/** Literal search and replace, applying each replacement in order. */
export async function actionStringReplace(params: StringReplaceParams, ctx: StepContext): Promise<void> {
  const replacements = params.replacements.map((r) => {
    const from = renderString(r.toReplace.val, ctx.scope, r.toReplace.pos);
    if (from === '') {
      throw new ConfigError('the string to replace must not be empty', { pos: r.toReplace.pos });
    }
    return {
      from: encoder.encode(from),
      to: encoder.encode(renderString(r.with.val, ctx.scope, r.with.pos)),
      count: r.count ?? -1,
    };
  });

  await walkAndModify(ctx, params.paths, (buf) => {
    let out = buf;
    for (const r of replacements) {
      out = replaceBytes(out, r.from, r.to, r.count);
    }
    return out;
  });
}
