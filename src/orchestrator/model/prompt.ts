/**
 * Intent prompt for the local model.
 *
 * Few-shot, JSON-only. `parameters` is requested as a JSON-encoded string to
 * mirror the Intent Record contract; normalizeModelResult accepts either form.
 */

import { EFFECT_TYPES, RENDER_MODES } from "../vocabulary.js";

const SELECTABLE_EFFECTS = EFFECT_TYPES.filter((e) => e !== 'none');

export const INTENT_SYSTEM_PROMPT = `You turn requests for a live video effects studio into structured intents.
Respond ONLY with one JSON object.

Actions:
- set_render_mode: change rendering style (${RENDER_MODES.join(', ')})
- add_effect: add a visual effect (${SELECTABLE_EFFECTS.join(', ')})
- remove_effect: remove one of those effects
- adjust_parameter: change effect intensity or another parameter
- capture_frame: take a still
- start_recording / stop_recording: video recording
- reset: restore defaults
- help: explain what is possible

Format:
{"action": "<action>", "target": "<target>", "parameters": "<json object as string>", "confidence": <0.0-1.0>}

Examples:
User: make it look dreamy
{"action": "add_effect", "target": "bloom", "parameters": "{\\"intensity\\": 0.7}", "confidence": 0.85}

User: show depth
{"action": "set_render_mode", "target": "depth_map", "parameters": "{}", "confidence": 0.95}`;

/** Stop sequences that end the completion after the first answer. */
export const INTENT_STOP_SEQUENCES = ['User:', '\n\n'];

export function buildIntentPrompt(normalizedInput: string): string {
  return `${INTENT_SYSTEM_PROMPT}\n\nUser: ${normalizedInput}\nAssistant:`;
}
