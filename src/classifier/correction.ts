/**
 * Suggested Error Correction
 *
 * A proposed replacement value for a malformed parameter, tagged with the
 * CLI flag it belongs to.
 */

/** Kinds of correction a handler can propose */
export type CorrectionKind = 'InvalidArgument';

/**
 * Internal field names as they appear in validator messages, mapped to the
 * flag a user actually types.
 */
export const PARAMETER_FLAGS: Readonly<Record<string, string>> = Object.freeze({
  resource_group_name: '--resource-group',
  name: '--name',
  location: '--location',
  account_name: '--account-name',
  vm_name: '--vm-name',
  subscription: '--subscription',
  tags: '--tags',
});

/**
 * Map an internal field name to its CLI flag.
 * `aliases` win over the built-in table; unknown names are kept verbatim.
 */
export function normalizeParameter(
  parameter: string,
  aliases: Readonly<Record<string, string>> = {}
): string {
  return lookup(aliases, parameter) ?? lookup(PARAMETER_FLAGS, parameter) ?? parameter;
}

// Own keys only: "constructor" or "toString" must not hit Object.prototype
function lookup(table: Readonly<Record<string, string>>, key: string): string | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

export class SuggestedErrorCorrection {
  readonly suggestion: string;
  readonly correctionKind: CorrectionKind;
  readonly parameter?: string;

  constructor(
    suggestion: string,
    correctionKind: CorrectionKind,
    parameter?: string,
    aliases: Readonly<Record<string, string>> = {}
  ) {
    this.suggestion = suggestion;
    this.correctionKind = correctionKind;
    this.parameter =
      parameter !== undefined ? normalizeParameter(parameter, aliases) : undefined;
    Object.freeze(this);
  }

  toJSON(): { suggestion: string; correctionKind: CorrectionKind; parameter?: string } {
    return {
      suggestion: this.suggestion,
      correctionKind: this.correctionKind,
      parameter: this.parameter,
    };
  }

  toString(): string {
    return this.parameter
      ? `${this.parameter} ${this.suggestion}`
      : this.suggestion;
  }
}
