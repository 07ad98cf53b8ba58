/**
 * 对外接口
 */

export { ToolkitError } from './core/utils'
export { CollectedErrors, DetailedGrammarError, ErrorCollector, ErrorType } from './core/ErrorCollector'
export * from './core/grammar/GrammarTypes'
export { Grammar } from './core/grammar/Grammar'
export { SymbolSet } from './core/grammar/SymbolSet'
export * from './core/automata/AutomatonTypes'
export { PushdownAutomaton } from './core/automata/PushdownAutomaton'
export { computeNullable, eliminateEpsilon, EpsilonEliminationOptions } from './normalizer/EpsilonEliminator'
export { computeUnitClosure, eliminateUnits } from './normalizer/UnitProductionEliminator'
export { computeGenerating, computeReachable, pruneUseless } from './normalizer/UselessSymbolPruner'
export { normalize, normalizeWithStages, NormalizationOptions, NormalizationStage, StageResult } from './normalizer/NormalizationPipeline'
export { convert, ConversionOptions, toEmptyStackAutomaton } from './converter/PdaToCfgConverter'
export { GrammarFileParser, loadGrammarFile } from './io/GrammarFileParser'
export { AutomatonFile, AutomatonFileParser, loadAutomatonFile } from './io/AutomatonFileParser'
export { formatGrammar, formatProductions } from './io/GrammarPrinter'
