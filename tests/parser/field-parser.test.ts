import { describe, expect, it } from 'vitest';
import { applyFieldValue, parseDone, parseFieldLine, resolveFieldKey } from '../../src/parser/field-parser.js';
import type { TodoFields } from '../../src/schema/index.js';

describe('parseFieldLine', () => {
  it('splits key and value on the first colon', () => {
    expect(parseFieldLine(' description: Retry: with backoff ')).toEqual({
      kind: 'field',
      key: 'description',
      value: 'Retry: with backoff',
    });
  });

  it('lower-cases keys', () => {
    expect(parseFieldLine('Assigned: Bob')).toEqual({ kind: 'field', key: 'assigned', value: 'Bob' });
  });

  it('treats an empty comment as blank', () => {
    expect(parseFieldLine('   ')).toEqual({ kind: 'blank' });
  });

  it('flags lines without a key', () => {
    expect(parseFieldLine(' just words ')).toEqual({ kind: 'malformed', text: 'just words' });
    expect(parseFieldLine(': value')).toEqual({ kind: 'malformed', text: ': value' });
  });

  it('allows an empty value', () => {
    expect(parseFieldLine(' due:')).toEqual({ kind: 'field', key: 'due', value: '' });
  });
});

describe('resolveFieldKey', () => {
  it('maps aliases and rejects unknown keys', () => {
    expect(resolveFieldKey('assigned')).toBe('assignee');
    expect(resolveFieldKey('DONE')).toBe('done');
    expect(resolveFieldKey('owner')).toBeNull();
  });
});

describe('parseDone', () => {
  it('reads common boolean spellings', () => {
    expect(parseDone('True')).toBe(true);
    expect(parseDone('yes')).toBe(true);
    expect(parseDone('x')).toBe(true);
    expect(parseDone('false')).toBe(false);
    expect(parseDone('No')).toBe(false);
    expect(parseDone('maybe')).toBeNull();
  });
});

describe('applyFieldValue', () => {
  it('normalizes priorities', () => {
    const target: Partial<TodoFields> = {};
    expect(applyFieldValue(target, 'priority', 'high')).toBeNull();
    expect(target.priority).toBe('HIGH');
    expect(applyFieldValue(target, 'priority', '2')).toBeNull();
    expect(target.priority).toBe('MEDIUM');
  });

  it('leaves the previous value when a value is rejected', () => {
    const target: Partial<TodoFields> = { due: '2024-05-01' };
    expect(applyFieldValue(target, 'due', '05/01/2024')).toBe("Invalid due date '05/01/2024'. Use YYYY-MM-DD.");
    expect(target.due).toBe('2024-05-01');
  });

  it('clears due and assignee on empty values', () => {
    const target: Partial<TodoFields> = { due: '2024-05-01', assignee: 'alice' };
    applyFieldValue(target, 'due', '');
    applyFieldValue(target, 'assignee', '');
    expect(target).toEqual({});
  });
});
