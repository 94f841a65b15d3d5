import { describe, it, expect } from 'vitest';
import { ToolArgumentValidator } from './toolArguments.js';
import type { ToolDefinition } from '../providers/providerContract.js';

const WRITE_FILE: ToolDefinition = {
  name: 'write_file',
  description: 'Write a file',
  parameters: {
    type: 'object',
    properties: { path: { type: 'string' }, contents: { type: 'string' } },
    required: ['path'],
  },
};

describe('ToolArgumentValidator', () => {
  it('accepts arguments that match the schema', () => {
    const validator = new ToolArgumentValidator();
    expect(validator.check(WRITE_FILE, { path: 'a.txt', contents: 'hi' })).toEqual({ ok: true });
  });

  it('names the offending property', () => {
    const validator = new ToolArgumentValidator();
    expect(validator.check(WRITE_FILE, { path: 3 })).toEqual({
      ok: false,
      message: 'Invalid arguments for tool "write_file": /path must be string',
    });
  });

  it('reports a missing required property against the root', () => {
    const validator = new ToolArgumentValidator();
    expect(validator.check(WRITE_FILE, { contents: 'hi' })).toEqual({
      ok: false,
      message: `Invalid arguments for tool "write_file": / must have required property 'path'`,
    });
  });

  it('lists every violation', () => {
    const validator = new ToolArgumentValidator();
    expect(validator.check(WRITE_FILE, { path: 1, contents: 2 })).toEqual({
      ok: false,
      message: 'Invalid arguments for tool "write_file": /path must be string; /contents must be string',
    });
  });

  it('reuses the compiled schema for the same definition', () => {
    const validator = new ToolArgumentValidator();
    expect(validator.check(WRITE_FILE, { path: 3 }).ok).toBe(false);
    expect(validator.check(WRITE_FILE, { path: 'b.txt' }).ok).toBe(true);
  });

  it('tolerates keywords it does not know', () => {
    const validator = new ToolArgumentValidator();
    const tool: ToolDefinition = {
      name: 'search',
      description: 'Search',
      parameters: { type: 'object', 'x-display': 'compact', properties: { query: { type: 'string' } } },
    };
    expect(validator.check(tool, { query: 'cats' })).toEqual({ ok: true });
  });

  it('turns a schema that does not compile into a failed check', () => {
    const validator = new ToolArgumentValidator();
    const tool: ToolDefinition = {
      name: 'broken',
      description: 'Broken schema',
      parameters: { type: 'object', properties: { path: { type: 'text' } } },
    };
    const check = validator.check(tool, { path: 'a.txt' });
    expect(check.ok).toBe(false);
    expect(!check.ok && check.message).toMatch(/^Invalid JSON schema for tool "broken": schema is invalid/);
  });
});
