/** 1-based position of a node in its source file. */
export interface SourceLocation {
  file?: string;
  startLine: number;
  startCol: number;
  endLine?: number;
  endCol?: number;
}

// Unresolved type expressions, as written in the source

export interface FeltTypeExpr {
  kind: "felt";
  location?: SourceLocation;
}

export interface NamedTypeExpr {
  kind: "named";
  name: string;
  location?: SourceLocation;
}

export interface PointerTypeExpr {
  kind: "pointer";
  pointee: TypeExpr;
  location?: SourceLocation;
}

export interface TupleTypeExprMember {
  name?: string;
  type: TypeExpr;
}

export interface TupleTypeExpr {
  kind: "tuple";
  members: ReadonlyArray<TupleTypeExprMember>;
  location?: SourceLocation;
}

export type TypeExpr =
  | FeltTypeExpr
  | NamedTypeExpr
  | PointerTypeExpr
  | TupleTypeExpr;

export interface TypedIdentifier {
  name: string;
  /** Absent when the source omits the annotation, which means `felt`. */
  type?: TypeExpr;
  location?: SourceLocation;
}

export interface IdentifierList {
  identifiers: ReadonlyArray<TypedIdentifier>;
  location?: SourceLocation;
}

export interface Decorator {
  name: string;
  location?: SourceLocation;
}

// Attributes attached to a function by earlier preprocessor stages

export type EntryPointType = "external" | "view" | "l1_handler" | "constructor";

export interface ExternalWrapperAttribute {
  kind: "external-wrapper";
  wrappedFunction: string;
}

export interface EntryPointAttribute {
  kind: "entry-point";
  entryPointType: EntryPointType;
}

export type FunctionAttribute = ExternalWrapperAttribute | EntryPointAttribute;

export type FunctionAttributeKind = FunctionAttribute["kind"];

export interface FunctionDecl {
  name: string;
  location?: SourceLocation;
  arguments: IdentifierList;
  implicitArguments?: IdentifierList;
  returns?: TypeExpr;
  decorators: ReadonlyArray<Decorator>;
  additionalAttributes: ReadonlyArray<FunctionAttribute>;
}
