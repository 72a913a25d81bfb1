import { VariableResolutionError } from '../../src/middleware/errors';
import { createMessage, userMessage } from '../../src/services/arium/messages';
import {
  extractVariables,
  extractVariablesFromInputs,
  resolveVariables,
  validateVariables,
} from '../../src/services/arium/variables';

describe('variables', () => {
  it('extracts unique placeholder names', () => {
    expect([...extractVariables('a <x> b <y> c <x>')]).toEqual(['x', 'y']);
    expect(extractVariables(undefined).size).toBe(0);
  });

  it('extracts placeholders from text inputs only', () => {
    const names = extractVariablesFromInputs([
      'about <topic>',
      userMessage('in <language>'),
      createMessage('user', { type: 'image', url: 'https://example.test/<ignored>.png' }),
    ]);
    expect([...names]).toEqual(['topic', 'language']);
  });

  it('substitutes supplied values', () => {
    expect(resolveVariables('Hello <name>', { name: 'World' })).toBe('Hello World');
  });

  it('returns text without placeholders unchanged', () => {
    expect(resolveVariables('no placeholders here', {})).toBe('no placeholders here');
  });

  it('names the missing variable', () => {
    let caught: unknown;
    try {
      resolveVariables('Hello <name>', {});
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(VariableResolutionError);
    const error = caught as VariableResolutionError;
    expect(error.missing).toEqual(['name']);
    expect(error.message).toBe('Missing required variables:\n  - text: name\nProvided variables: []');
  });

  it('ignores inherited object properties when resolving', () => {
    expect(() => resolveVariables('<toString>', {})).toThrow(VariableResolutionError);
  });

  it('groups every missing name by the owner that needs it', () => {
    const required = new Map([
      ['writer', new Set(['tone', 'topic'])],
      ['inputs', new Set(['topic'])],
      ['editor', new Set(['tone'])],
    ]);

    expect(() => validateVariables(required, { tone: 'dry' })).toThrow(
      'Missing required variables:\n  - writer: topic\n  - inputs: topic\nProvided variables: [tone]',
    );
  });

  it('passes when every requirement is met', () => {
    const required = new Map([['writer', new Set(['topic'])]]);
    expect(() => validateVariables(required, { topic: 'graphs', extra: 'unused' })).not.toThrow();
  });
});
