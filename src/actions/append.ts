import type { AppendParams } from '../model.js';
import { renderString } from '../template.js';
import { walkAndModify } from '../walk-modify.js';
import type { StepContext } from './context.js';

const encoder = new TextEncoder();

/**
 * Append text to the end of each selected file. Unless `skipEnsureNewline`
 * is set, the text gets a trailing newline if it lacks one.
 */
export async function actionAppend(params: AppendParams, ctx: StepContext): Promise<void> {
  let text = renderString(params.with.val, ctx.scope, params.with.pos);
  if (!params.skipEnsureNewline && !text.endsWith('\n')) {
    text += '\n';
  }
  const suffix = encoder.encode(text);

  await walkAndModify(ctx, params.paths, (buf) => {
    const out = new Uint8Array(buf.length + suffix.length);
    out.set(buf);
    out.set(suffix, buf.length);
    return out;
  });
}
