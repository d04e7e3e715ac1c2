import { describe, expect, it } from 'vitest';
import { SYSTEM_PROMPT, buildPrompt, renderPayload } from '../prompt.js';

const record = { patient_id: 'P1', lactate: 4.2, shock: true };

describe('renderPayload', () => {
  it('renders pretty JSON by default', () => {
    expect(renderPayload(record, 'json')).toBe('{\n  "patient_id": "P1",\n  "lactate": 4.2,\n  "shock": true\n}');
  });

  it('renders compact JSON on request', () => {
    expect(renderPayload(record, 'json', 'compact')).toBe('{"patient_id":"P1","lactate":4.2,"shock":true}');
  });

  it('renders TOON', () => {
    expect(renderPayload(record, 'toon')).toBe('patient_id: P1\nlactate: 4.2\nshock: true');
  });
});

describe('buildPrompt', () => {
  it('embeds the payload, question and answer labels', () => {
    const built = buildPrompt('patient_id: P1', 'toon', 'Is the patient in shock?', ['yes', 'no']);
    expect(built.system).toBe(SYSTEM_PROMPT);
    expect(built.payload).toBe('patient_id: P1');
    expect(built.prompt).toBe(
      [
        'You are a medical AI assistant analyzing patient data.',
        '',
        'Patient Data (TOON format):',
        'patient_id: P1',
        '',
        'Question: Is the patient in shock?',
        '',
        'Start your answer with one of: yes, no.',
        'Provide a clear, accurate answer based on the data provided.',
      ].join('\n'),
    );
  });

  it('differs between encodings only in format name and payload', () => {
    const json = buildPrompt('PAYLOAD', 'json', 'Q?', ['a', 'b']).prompt;
    const toon = buildPrompt('PAYLOAD', 'toon', 'Q?', ['a', 'b']).prompt;
    expect(json.replace('(JSON format)', '(TOON format)')).toBe(toon);
  });
});
