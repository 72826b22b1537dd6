/**
 * Step execution: runs each action of a template in order.
 */

import { walkDir } from '../fs.js';
import { getLogger } from '../logger.js';
import type { Step } from '../model.js';
import { ConfigError, StepError } from '../types.js';
import { actionAppend } from './append.js';
import type { StepContext } from './context.js';
import { actionForEach } from './for-each.js';
import { actionGoTemplate } from './go-template.js';
import { actionInclude } from './include.js';
import { actionPrint } from './print.js';
import { actionRegexNameLookup } from './regex-name-lookup.js';
import { actionRegexReplace } from './regex-replace.js';
import { actionStringReplace } from './string-replace.js';

const logger = getLogger('steps');

/**
 * Run `steps` in order against the scratch directory. The first failure
 * stops the sequence and is thrown as a {@link StepError} naming the step;
 * whatever earlier steps did to the scratch directory stays done.
 */
export async function executeSteps(steps: Step[], ctx: StepContext): Promise<void> {
  for (const [i, step] of steps.entries()) {
    ctx.signal?.throwIfAborted();
    try {
      await executeOneStep(step, i, ctx);
    } catch (err) {
      if (ctx.signal?.aborted && err === ctx.signal.reason) throw err;
      throw new StepError(i, step.action, err, step.pos);
    }
    logger.debug('completed template action', { action: step.action, stepIndex: i });
    if (ctx.debugScratchContents) {
      logger.warn(await scratchContents(ctx, i, step));
    }
  }
}

async function executeOneStep(step: Step, index: number, ctx: StepContext): Promise<void> {
  if (step.if && step.if.val !== '') {
    if (!ctx.evaluator) {
      throw new ConfigError('"if" needs an expression evaluator, but none was configured', { pos: step.if.pos });
    }
    const proceed = await ctx.evaluator.evalBool(step.if, ctx.scope);
    logger.debug(`${proceed ? 'proceeding with' : 'skipping'} step because "if" evaluated to ${proceed}`, {
      stepIndex: index,
      action: step.action,
      expr: step.if.val,
    });
    if (!proceed) return;
  }

  switch (step.action) {
    case 'append':
      return actionAppend(step.params, ctx);
    case 'string_replace':
      return actionStringReplace(step.params, ctx);
    case 'regex_replace':
      return actionRegexReplace(step.params, ctx);
    case 'regex_name_lookup':
      return actionRegexNameLookup(step.params, ctx);
    case 'go_template':
      return actionGoTemplate(step.params, ctx);
    case 'include':
      return actionInclude(step.params, ctx);
    case 'print':
      return actionPrint(step.params, ctx);
    case 'for_each':
      return actionForEach(step.params, ctx, executeSteps);
  }
}

async function scratchContents(ctx: StepContext, index: number, step: Step): Promise<string> {
  const files: string[] = [];
  await walkDir(ctx.fs, ctx.scratchDir, (_path, relPath, info) => {
    if (!info.isDirectory()) files.push(relPath);
  });
  const listing = files.length > 0 ? files.map((f) => `  ${f}`).join('\n') : '  (empty)';
  return `scratch directory contents after step ${index} (action "${step.action}"):\n${listing}`;
}
