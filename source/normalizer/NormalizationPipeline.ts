/**
 * 文法规范化流程：依次消除ε产生式、单产生式、无用符号
 */

import { Grammar } from '../core/grammar/Grammar'
import { EpsilonEliminationOptions, eliminateEpsilon } from './EpsilonEliminator'
import { eliminateUnits } from './UnitProductionEliminator'
import { pruneUseless } from './UselessSymbolPruner'

export type NormalizationStage = 'epsilon' | 'unit' | 'useless'

export type NormalizationOptions = EpsilonEliminationOptions

export interface StageResult {
  stage: NormalizationStage
  grammar: Grammar
}

// 阶段顺序影响结果的正确性
const STAGES: Array<{ stage: NormalizationStage; run: (grammar: Grammar, options: NormalizationOptions) => Grammar }> = [
  { stage: 'epsilon', run: eliminateEpsilon },
  { stage: 'unit', run: grammar => eliminateUnits(grammar) },
  { stage: 'useless', run: grammar => pruneUseless(grammar) },
]

/**
 * 规范化并返回每个阶段的中间文法
 */
export function normalizeWithStages(grammar: Grammar, options: NormalizationOptions = {}): StageResult[] {
  const results: StageResult[] = []
  let current = grammar
  for (const { stage, run } of STAGES) {
    current = run(current, options)
    results.push({ stage, grammar: current })
  }
  return results
}

export function normalize(grammar: Grammar, options: NormalizationOptions = {}): Grammar {
  const results = normalizeWithStages(grammar, options)
  return results[results.length - 1].grammar
}
