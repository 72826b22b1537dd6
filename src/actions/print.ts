import type { PrintParams } from '../model.js';
import { renderString } from '../template.js';
import { IoError } from '../types.js';
import type { StepContext } from './context.js';

/**
 * Write a message to the print sink, ending it with a newline. Print
 * messages also see the context's extra print variables.
 */
export async function actionPrint(params: PrintParams, ctx: StepContext): Promise<void> {
  const scope = ctx.scope.with({ ...ctx.extraPrintVars });
  let msg = renderString(params.message.val, scope, params.message.pos);
  if (!msg.endsWith('\n')) msg += '\n';
  try {
    ctx.stdout.write(msg);
  } catch (err) {
    throw new IoError('write', 'stdout', err, params.message.pos);
  }
}
