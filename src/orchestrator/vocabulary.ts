/**
 * Intent Vocabulary
 *
 * Closed sets of actions, render modes and effect types understood by the
 * host renderer. Index order of RENDER_MODES and EFFECT_TYPES is the wire
 * value shared with the renderer. Append only.
 */

// ============================================================================
// Closed Sets
// ============================================================================

export const INTENT_ACTIONS = [
  'set_render_mode',
  'add_effect',
  'remove_effect',
  'adjust_parameter',
  'capture_frame',
  'start_recording',
  'stop_recording',
  'reset',
  'help',
  'unknown',
] as const;

export const RENDER_MODES = [
  'passthrough',
  'stylized',
  'segmented',
  'depth_map',
  'normal_map',
] as const;

export const EFFECT_TYPES = [
  'none',
  'blur',
  'bloom',
  'color_grade',
  'vignette',
  'chromatic_aberration',
  'noise',
  'sharpen',
] as const;

export type IntentAction = typeof INTENT_ACTIONS[number];
export type RenderMode = typeof RENDER_MODES[number];
export type EffectType = typeof EFFECT_TYPES[number];

const ACTION_SET: ReadonlySet<string> = new Set(INTENT_ACTIONS);
const RENDER_MODE_SET: ReadonlySet<string> = new Set(RENDER_MODES);
const EFFECT_TYPE_SET: ReadonlySet<string> = new Set(EFFECT_TYPES);

export function isIntentAction(value: unknown): value is IntentAction {
  return typeof value === 'string' && ACTION_SET.has(value);
}

export function isRenderMode(value: unknown): value is RenderMode {
  return typeof value === 'string' && RENDER_MODE_SET.has(value);
}

export function isEffectType(value: unknown): value is EffectType {
  return typeof value === 'string' && EFFECT_TYPE_SET.has(value);
}

/** Renderer wire index for a render mode, or -1. */
export function renderModeIndex(mode: string): number {
  return RENDER_MODES.findIndex((m) => m === mode);
}

/** Renderer wire index for an effect type, or -1. */
export function effectTypeIndex(effect: string): number {
  return EFFECT_TYPES.findIndex((e) => e === effect);
}

/**
 * Whether `target` is acceptable for `action`.
 *
 * Only render-mode and effect actions constrain their target; every other
 * action accepts any string.
 */
export function isValidTargetFor(action: string, target: string): boolean {
  const lower = target.toLowerCase();
  if (action === 'set_render_mode') return isRenderMode(lower);
  if (action === 'add_effect' || action === 'remove_effect') return isEffectType(lower);
  return true;
}

// ============================================================================
// Confidence
// ============================================================================

/**
 * Clamp a confidence value into [0, 1].
 * Numeric strings are accepted; anything else (or NaN) becomes 0.
 */
export function clampConfidence(value: unknown): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
  if (Number.isNaN(n)) return 0;
  return Math.max(0, Math.min(1, n));
}

// ============================================================================
// Intent Record
// ============================================================================

/**
 * The externally visible result of one parse.
 *
 * `parameters` is a JSON-encoded object, not a nested object. Consumers on the
 * native side read a flat struct of strings and numbers, so the double
 * encoding is part of the contract.
 */
export interface IntentRecord {
  readonly action: IntentAction;
  readonly target: string;
  readonly parameters: string;
  readonly confidence: number;
  readonly timestamp: number;
}

export function createIntentRecord(fields: IntentRecord): IntentRecord {
  return Object.freeze({
    action: fields.action,
    target: fields.target,
    parameters: fields.parameters,
    confidence: fields.confidence,
    timestamp: fields.timestamp,
  });
}

export function intentToJson(intent: IntentRecord): string {
  return JSON.stringify({
    action: intent.action,
    target: intent.target,
    parameters: intent.parameters,
    confidence: intent.confidence,
    timestamp: intent.timestamp,
  });
}
