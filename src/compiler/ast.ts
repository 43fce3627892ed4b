// AST node definitions for the game language.
// The parser produces this tree once; later stages only read it and keep
// their findings in side tables keyed by node identity.

export interface Span {
	readonly line: number
	readonly column: number
	readonly length: number
}

// --- Top-level declarations ---

export interface Program {
	readonly kind: "Program"
	readonly games: GameDecl[]
	readonly sprites: SpriteDecl[]
	readonly scenes: SceneDecl[]
	readonly natives: NativeBlock[]
	readonly span: Span
}

/** `game Name { key = value ... }`, the program configuration block. */
export interface GameDecl {
	readonly kind: "GameDecl"
	readonly name: string
	readonly settings: Setting[]
	readonly span: Span
}

export interface Setting {
	readonly key: string
	readonly value: Expr
	readonly span: Span
}

/** Entity template: fields, input handlers and methods. */
export interface SpriteDecl {
	readonly kind: "SpriteDecl"
	readonly name: string
	readonly fields: FieldDecl[]
	readonly handlers: HandlerDecl[]
	readonly methods: MethodDecl[]
	readonly natives: NativeBlock[]
	readonly span: Span
}

export interface FieldDecl {
	readonly kind: "FieldDecl"
	readonly name: string
	readonly init: Expr
	readonly span: Span
}

export interface Param {
	readonly name: string
	readonly span: Span
}

export interface HandlerDecl {
	readonly kind: "HandlerDecl"
	/** Event kind, e.g. "keydown". */
	readonly event: string
	readonly params: Param[]
	readonly body: Block
	readonly span: Span
}

export interface MethodDecl {
	readonly kind: "MethodDecl"
	readonly name: string
	readonly params: Param[]
	readonly body: Block
	readonly span: Span
}

/** Scene template: per-frame `update` and `draw` plus scene-level fields. */
export interface SceneDecl {
	readonly kind: "SceneDecl"
	readonly name: string
	readonly fields: FieldDecl[]
	readonly update: SceneBody | null
	readonly draw: SceneBody | null
	readonly span: Span
}

export interface SceneBody {
	readonly kind: "SceneBody"
	readonly which: "update" | "draw"
	readonly body: Block
	readonly span: Span
}

/** Verbatim target-language text. */
export interface NativeBlock {
	readonly kind: "NativeBlock"
	readonly code: string
	readonly span: Span
}

/** A procedural body that owns its own local frame. */
export type BodyOwner = HandlerDecl | MethodDecl | SceneBody

// --- Statements ---

export type Stmt =
	| AssignStmt
	| IfStmt
	| WhileStmt
	| ForStmt
	| ReturnStmt
	| ExprStmt
	| NativeStmt

export interface Block {
	readonly kind: "Block"
	readonly stmts: Stmt[]
	readonly span: Span
}

export type AssignOp = "=" | "+=" | "-=" | "*=" | "/="

export interface AssignStmt {
	readonly kind: "AssignStmt"
	readonly target: AssignTarget
	readonly op: AssignOp
	readonly value: Expr
	readonly span: Span
}

export type AssignTarget = Ident | MemberExpr | IndexExpr

export interface IfStmt {
	readonly kind: "IfStmt"
	readonly condition: Expr
	readonly then: Block
	readonly else_: Block | IfStmt | null
	readonly span: Span
}

export interface WhileStmt {
	readonly kind: "WhileStmt"
	readonly condition: Expr
	readonly body: Block
	readonly span: Span
}

export interface ForStmt {
	readonly kind: "ForStmt"
	readonly variable: Ident
	readonly iterable: Expr
	readonly body: Block
	readonly span: Span
}

export interface ReturnStmt {
	readonly kind: "ReturnStmt"
	readonly value: Expr | null
	readonly span: Span
}

export interface ExprStmt {
	readonly kind: "ExprStmt"
	readonly expr: Expr
	readonly span: Span
}

export interface NativeStmt {
	readonly kind: "NativeStmt"
	readonly code: string
	readonly span: Span
}

// --- Expressions ---

export type Expr =
	| NumberLiteral
	| StringLiteral
	| BoolLiteral
	| Ident
	| BinaryExpr
	| UnaryExpr
	| CallExpr
	| MemberExpr
	| IndexExpr
	| TupleExpr
	| ListExpr

export interface NumberLiteral {
	readonly kind: "NumberLiteral"
	readonly value: number
	readonly span: Span
}

export interface StringLiteral {
	readonly kind: "StringLiteral"
	readonly value: string
	readonly span: Span
}

export interface BoolLiteral {
	readonly kind: "BoolLiteral"
	readonly value: boolean
	readonly span: Span
}

export interface Ident {
	readonly kind: "Ident"
	readonly name: string
	readonly span: Span
}

export type BinaryOp =
	| "+"
	| "-"
	| "*"
	| "/"
	| "%"
	| "=="
	| "!="
	| "<"
	| ">"
	| "<="
	| ">="
	| "and"
	| "or"

export interface BinaryExpr {
	readonly kind: "BinaryExpr"
	readonly op: BinaryOp
	readonly left: Expr
	readonly right: Expr
	readonly span: Span
}

export type UnaryOp = "-" | "not"

export interface UnaryExpr {
	readonly kind: "UnaryExpr"
	readonly op: UnaryOp
	readonly operand: Expr
	readonly span: Span
}

export interface CallExpr {
	readonly kind: "CallExpr"
	readonly callee: Expr
	readonly args: Expr[]
	readonly span: Span
}

export interface MemberExpr {
	readonly kind: "MemberExpr"
	readonly object: Expr
	readonly member: string
	readonly span: Span
}

export interface IndexExpr {
	readonly kind: "IndexExpr"
	readonly object: Expr
	readonly index: Expr
	readonly span: Span
}

/** `(a, b, c)`, used mostly for colors and points. */
export interface TupleExpr {
	readonly kind: "TupleExpr"
	readonly elements: Expr[]
	readonly span: Span
}

export interface ListExpr {
	readonly kind: "ListExpr"
	readonly elements: Expr[]
	readonly span: Span
}
