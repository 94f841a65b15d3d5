import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';
import type { JsonObject, ToolDefinition } from '../providers/providerContract.js';

export type ArgumentCheck = { ok: true } | { ok: false; message: string };

/**
 * Checks tool call arguments against the JSON Schema the tool declared.
 * Compiled validators are cached per tool definition.
 */
export class ToolArgumentValidator {
  // Tool schemas come from callers; unknown keywords are not an error
  private readonly ajv = new Ajv({ allErrors: true, strict: false });
  private readonly compiled = new WeakMap<ToolDefinition, ValidateFunction>();

  check(tool: ToolDefinition, args: JsonObject): ArgumentCheck {
    let validate: ValidateFunction;
    try {
      validate = this.compile(tool);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { ok: false, message: `Invalid JSON schema for tool "${tool.name}": ${reason}` };
    }

    if (validate(args)) return { ok: true };
    return {
      ok: false,
      message: `Invalid arguments for tool "${tool.name}": ${describeErrors(validate.errors ?? [])}`,
    };
  }

  private compile(tool: ToolDefinition): ValidateFunction {
    const cached = this.compiled.get(tool);
    if (cached) return cached;
    const validate = this.ajv.compile(tool.parameters);
    this.compiled.set(tool, validate);
    return validate;
  }
}

function describeErrors(errors: readonly ErrorObject[]): string {
  if (errors.length === 0) return 'does not match the schema';
  return errors.map((error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`).join('; ');
}
