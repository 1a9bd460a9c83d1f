// Tests for ArtifactPresenceCheck

import { describe, it, expect } from 'vitest';
import { checkArtifacts } from './artifact-presence-check.js';
import { REQUIRED_ARTIFACTS } from '../../models/requirements.js';

describe('checkArtifacts', () => {
  it('should pass when every artifact exists', () => {
    const outcome = checkArtifacts(REQUIRED_ARTIFACTS, () => true);

    expect(outcome.passed).toBe(true);
    expect(outcome.messages).toEqual([
      { kind: 'success', text: 'detector.js exists' },
      { kind: 'success', text: 'bpf.c exists' },
      { kind: 'success', text: 'bpf.h exists' }
    ]);
  });

  it('should name exactly the missing artifacts', () => {
    const present = new Set(['detector.js', 'bpf.c']);
    const outcome = checkArtifacts(REQUIRED_ARTIFACTS, file => present.has(file));

    expect(outcome.passed).toBe(false);
    expect(outcome.messages.filter(line => line.kind === 'failure')).toEqual([
      { kind: 'failure', text: 'bpf.h not found' }
    ]);
  });

  it('should test every artifact even after a miss', () => {
    const asked: string[] = [];
    checkArtifacts(REQUIRED_ARTIFACTS, file => {
      asked.push(file);
      return false;
    });

    expect(asked).toEqual(['detector.js', 'bpf.c', 'bpf.h']);
  });
});
