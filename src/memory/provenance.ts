import { createHash } from 'crypto';
import type { EpisodeKind, EpisodePayload, JsonValue } from './types.js';

export function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf-8').digest('hex');
}

// Key order must not affect the hash, so objects are serialised with sorted keys.
function canonicalize(value: JsonValue | undefined): string {
  if (value === undefined) return 'null';
  if (Array.isArray(value)) {
    return `[${value.map((v) => canonicalize(v)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const obj = value;
    const keys = Object.keys(obj).filter((k) => obj[k] !== undefined).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${canonicalize(obj[k])}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

export function episodeContentHash(kind: EpisodeKind, payload: EpisodePayload): string {
  const skill = payload.skill;
  const doc: JsonValue = {
    kind,
    text: payload.text,
    fields: payload.fields ?? null,
    verified: payload.verified ?? false,
    skill: skill
      ? {
          name: skill.name,
          succeeded: skill.succeeded,
          failureMode: skill.failureMode ?? null,
          steps: skill.steps ?? null,
          preconditions: skill.preconditions ?? null,
        }
      : null,
  };
  return sha256(canonicalize(doc));
}
