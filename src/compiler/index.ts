import type { Compiler } from "../../spec/compiler"
import { compile } from "./instantiate"

export { Lexer, tokenize } from "./lexer"
export { Parser, parse } from "./parser"
export { TokenKind } from "./token"
export type { Token } from "./token"
export type {
	Program,
	GameDecl,
	SpriteDecl,
	SceneDecl,
	HandlerDecl,
	MethodDecl,
	Expr,
	Stmt,
	Block,
	BodyOwner,
	SceneBody,
} from "./ast"
export type { Diagnostic, Phase, Severity, SourceLocation } from "./errors"
export { DiagnosticList, CodeGenError, formatDiagnostic, formatDiagnostics } from "./errors"
export { analyze, EVENT_SIGNATURES } from "./analyzer"
export type { AnalysisResult, SpriteInfo, SceneInfo } from "./analyzer"
export { codegen, generate } from "./codegen"
export { compile, instantiate, compileAndInstantiate, CompileError } from "./instantiate"
export type { CompileResult } from "./instantiate"
export { createDebugLog } from "./debug-log"
export type { GameDebugLog, DebugMessage, TrapMessage, HostCallMessage } from "./debug-log"
export { DEFAULT_COMPILE_OPTIONS, DEFAULT_SETTINGS } from "./defaults"
export type { CompileOptions, OutputFormat } from "./defaults"
export type { SymbolInfo, Resolution } from "./scope"
export type { ValueType } from "./types"
export { typeToString } from "./types"

export const compiler: Compiler = { compile }
