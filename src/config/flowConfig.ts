/**
 * Validation for the sequence configuration.
 *
 * The configuration arrives as untrusted JSON, so every field is checked by
 * hand; optional media with the wrong type is dropped rather than failing the
 * whole sequence.
 */

import { ConfigurationError } from '../player/errors';
import type { BundleKind, FlowConfig, PhaseMedia, QuestionSet } from '../types/flow';

export const DEFAULT_OFFSET_SECONDS = -0.12;

const MEDIA_FIELDS = ['video', 'narration', 'music', 'captions'] as const;
type MediaField = (typeof MEDIA_FIELDS)[number];

type EnvSource = Record<string, string | boolean | undefined>;

// ─── Primitive readers ────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function resolveNumeric(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return null;
}

export function parseBooleanFlag(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string' || !value.trim()) return undefined;
  const val = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(val)) return true;
  if (['0', 'false', 'no', 'off'].includes(val)) return false;
  throw new ConfigurationError(`Invalid boolean '${value}'`);
}

function capitalise(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

// ─── Question sets ────────────────────────────────────────────────────

function readMediaRef(value: unknown, path: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    console.warn('Ignoring non-string media reference', path, value);
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? value : undefined;
}

/**
 * Accepts both `{ question: { video } }` and the flat
 * `{ questionVideo, successNarration, ... }` spelling.
 */
function readPhaseMedia(raw: Record<string, unknown>, kind: BundleKind, path: string): PhaseMedia {
  const candidate = raw[kind];
  const nested = isRecord(candidate) ? candidate : null;
  const media: { -readonly [Field in MediaField]?: string } = {};
  for (const field of MEDIA_FIELDS) {
    const flatKey = `${kind}${capitalise(field)}`;
    const value = nested && nested[field] !== undefined ? nested[field] : raw[flatKey];
    const ref = readMediaRef(value, `${path}.${kind}.${field}`);
    if (ref !== undefined) {
      media[field] = ref;
    }
  }
  return media;
}

export function parseQuestionSet(raw: unknown, index: number): QuestionSet {
  const path = `questions[${index}]`;
  if (!isRecord(raw)) {
    console.warn('Question entry is not an object; treating it as empty', path);
    return { question: {}, success: {}, failure: {} };
  }
  return {
    question: readPhaseMedia(raw, 'question', path),
    success: readPhaseMedia(raw, 'success', path),
    failure: readPhaseMedia(raw, 'failure', path),
  };
}

// ─── Top level ────────────────────────────────────────────────────────

/**
 * Build a `FlowConfig` from parsed JSON. Throws `ConfigurationError` when the
 * sequence could never start: no questions, or no video for the first one.
 */
export function parseFlowConfig(raw: unknown, overrides: Partial<FlowConfig> = {}): FlowConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Flow configuration must be an object');
  }
  const rawQuestions = Array.isArray(raw.questions) ? raw.questions : [];
  const questions = rawQuestions.map((entry, index) => parseQuestionSet(entry, index));
  if (questions.length === 0) {
    throw new ConfigurationError('Sequence is empty');
  }
  if (!questions[0].question.video) {
    throw new ConfigurationError('Missing question video for the first question', 0);
  }

  const offset = resolveNumeric(raw.offsetSeconds);
  if (raw.offsetSeconds !== undefined && offset === null) {
    console.warn('Ignoring invalid offsetSeconds', raw.offsetSeconds);
  }
  const clearFlag = typeof raw.clearCaptionsInGaps === 'boolean' ? raw.clearCaptionsInGaps : undefined;

  return {
    questions: overrides.questions ?? questions,
    offsetSeconds: overrides.offsetSeconds ?? offset ?? DEFAULT_OFFSET_SECONDS,
    clearCaptionsInGaps: overrides.clearCaptionsInGaps ?? clearFlag ?? true,
  };
}

/** Read `VITE_CAPTION_OFFSET_SECONDS` and `VITE_CLEAR_CAPTIONS_IN_GAPS`. */
export function resolveEnvOverrides(env: EnvSource): Partial<FlowConfig> {
  const overrides: { offsetSeconds?: number; clearCaptionsInGaps?: boolean } = {};
  const offset = resolveNumeric(env.VITE_CAPTION_OFFSET_SECONDS);
  if (offset !== null) {
    overrides.offsetSeconds = offset;
  }
  const clear = parseBooleanFlag(env.VITE_CLEAR_CAPTIONS_IN_GAPS);
  if (clear !== undefined) {
    overrides.clearCaptionsInGaps = clear;
  }
  return overrides;
}
