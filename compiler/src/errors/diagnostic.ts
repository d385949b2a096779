/**
 * Diagnostic records and the catalogue of every diagnostic the SIL front end
 * can emit. Each catalogue entry fixes the severity and the argument list of
 * its message, so call sites are checked against the message they produce.
 */

export enum Severity {
  Error = "error",
  Warning = "warning",
  Note = "note",
}

export interface SourceLocation {
  file: string;
  line: number;
  column: number;
  offset: number;
}

export interface Diagnostic {
  kind: DiagnosticKind;
  severity: Severity;
  message: string;
  location: SourceLocation;
}

// ─── Catalogue ──────────────────────────────────────────────────────────────

/** Argument tuple for each diagnostic kind. */
export interface DiagnosticArgMap {
  // Lexer
  unexpectedCharacter: [ch: string];
  silOnlyCharacter: [ch: string];
  unterminatedComment: [];

  // General syntax
  expectedToken: [expected: string, found: string];
  expectedIdentifier: [found: string];
  expectedType: [found: string];
  expectedDeclaration: [found: string];
  openingBracketNote: [bracket: string];

  // SIL declarations and bodies
  expectedSilLinkageOrFunction: [];
  expectedSilFunctionName: [];
  expectedSilType: [];
  expectedSilRbrace: [];
  expectedSilBlockName: [];
  expectedSilBlockColon: [];

  // SIL types
  expectedIdentifierSilTypeAttributes: [];
  malformedSilUncurryAttribute: [];
  unknownSilTypeAttribute: [name: string];
  expectedBracketSilTypeAttributes: [];

  // SIL instructions
  expectedSilColonValueRef: [];
  expectedSilValueName: [];
  expectedSilInstrOpcode: [];
  expectedSilInstrName: [];
  expectedSilInstrStartOfLine: [];
  expectedEqualInSilInstr: [];
  expectedTokInSilInstr: [token: string, opcode: string];

  // Block resolution
  undefinedBasicBlockUse: [name: string];
  basicBlockRedefinition: [name: string];

  // Type checking
  undeclaredType: [name: string];
  typeRedeclaration: [name: string];
  circularTypeAlias: [name: string];
}

export type DiagnosticKind = keyof DiagnosticArgMap;

interface DiagnosticSpec<Args extends unknown[]> {
  severity: Severity;
  format: (...args: Args) => string;
}

export const DIAGNOSTICS: { [K in DiagnosticKind]: DiagnosticSpec<DiagnosticArgMap[K]> } = {
  unexpectedCharacter: {
    severity: Severity.Error,
    format: (ch) => `unexpected character '${ch}'`,
  },
  silOnlyCharacter: {
    severity: Severity.Error,
    format: (ch) => `'${ch}' is only valid inside a SIL declaration`,
  },
  unterminatedComment: {
    severity: Severity.Error,
    format: () => "unterminated '/*' comment",
  },

  expectedToken: {
    severity: Severity.Error,
    format: (expected, found) => `expected '${expected}' but found '${found}'`,
  },
  expectedIdentifier: {
    severity: Severity.Error,
    format: (found) => `expected identifier but found '${found}'`,
  },
  expectedType: {
    severity: Severity.Error,
    format: (found) => `expected type but found '${found}'`,
  },
  expectedDeclaration: {
    severity: Severity.Error,
    format: (found) => `expected 'sil', 'typealias' or 'struct' declaration but found '${found}'`,
  },
  openingBracketNote: {
    severity: Severity.Note,
    format: (bracket) => `to match this opening '${bracket}'`,
  },

  expectedSilLinkageOrFunction: {
    severity: Severity.Error,
    format: () => "expected SIL linkage type or function name",
  },
  expectedSilFunctionName: {
    severity: Severity.Error,
    format: () => "expected SIL function name",
  },
  expectedSilType: {
    severity: Severity.Error,
    format: () => "expected type in SIL code",
  },
  expectedSilRbrace: {
    severity: Severity.Error,
    format: () => "expected '}' at the end of a SIL body",
  },
  expectedSilBlockName: {
    severity: Severity.Error,
    format: () => "expected basic block name",
  },
  expectedSilBlockColon: {
    severity: Severity.Error,
    format: () => "expected ':' after basic block name",
  },

  expectedIdentifierSilTypeAttributes: {
    severity: Severity.Error,
    format: () => "expected identifier in SIL type attribute list",
  },
  malformedSilUncurryAttribute: {
    severity: Severity.Error,
    format: () => "expected '=' and an unsigned integer in 'sil_uncurry' attribute",
  },
  unknownSilTypeAttribute: {
    severity: Severity.Error,
    format: (name) => `unknown SIL type attribute '${name}'`,
  },
  expectedBracketSilTypeAttributes: {
    severity: Severity.Error,
    format: () => "expected ']' to complete SIL type attribute list",
  },

  expectedSilColonValueRef: {
    severity: Severity.Error,
    format: () => "expected ':' before SIL value reference",
  },
  expectedSilValueName: {
    severity: Severity.Error,
    format: () => "expected SIL value name",
  },
  expectedSilInstrOpcode: {
    severity: Severity.Error,
    format: () => "expected SIL opcode",
  },
  expectedSilInstrName: {
    severity: Severity.Error,
    format: () => "expected '%' name for SIL instruction",
  },
  expectedSilInstrStartOfLine: {
    severity: Severity.Error,
    format: () => "SIL instructions must be at the start of a line",
  },
  expectedEqualInSilInstr: {
    severity: Severity.Error,
    format: () => "expected '=' in SIL instruction",
  },
  expectedTokInSilInstr: {
    severity: Severity.Error,
    format: (token, opcode) => `expected '${token}' in '${opcode}' instruction`,
  },

  undefinedBasicBlockUse: {
    severity: Severity.Error,
    format: (name) => `use of undefined basic block '${name}'`,
  },
  basicBlockRedefinition: {
    severity: Severity.Error,
    format: (name) => `redefinition of basic block '${name}'`,
  },

  undeclaredType: {
    severity: Severity.Error,
    format: (name) => `use of undeclared type '${name}'`,
  },
  typeRedeclaration: {
    severity: Severity.Error,
    format: (name) => `invalid redeclaration of '${name}'`,
  },
  circularTypeAlias: {
    severity: Severity.Error,
    format: (name) => `type alias '${name}' references itself`,
  },
};
