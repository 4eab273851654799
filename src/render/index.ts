import { PlanGraphError, ErrorCode } from '../lib/errors.js';

export { renderOutline } from './outline.js';
export { renderFlowchart } from './flowchart.js';
export { renderDot, quoteDot } from './dot.js';

export const RENDER_FORMATS = ['outline', 'flowchart', 'dot'] as const;

export type RenderFormat = (typeof RENDER_FORMATS)[number];

export function isRenderFormat(value: string): value is RenderFormat {
  return RENDER_FORMATS.some((format) => format === value);
}

/** Narrow a user-supplied format name; throws UNKNOWN_FORMAT otherwise */
export function toRenderFormat(value: string): RenderFormat {
  if (isRenderFormat(value)) return value;
  throw new PlanGraphError(
    ErrorCode.UNKNOWN_FORMAT,
    `Unknown render format: "${value}"`,
    `Use one of: ${RENDER_FORMATS.join(', ')}`,
  );
}
