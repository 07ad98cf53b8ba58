/**
 * ε产生式消除
 */

import { Grammar } from '../core/grammar/Grammar'
import { EPSILON, GrammarSymbol, NonterminalSymbol, Production, isEpsilon } from '../core/grammar/GrammarTypes'
import { SymbolSet } from '../core/grammar/SymbolSet'
import { requireCondition } from '../core/utils'

// 位掩码按32位整数运算，可空出现位置数须小于31
export const MAX_NULLABLE_OCCURRENCES = 30

export interface EpsilonEliminationOptions {
  keepStartEpsilon?: boolean // 开始符号可空时保留 start -> ε，默认为true
}

/**
 * 计算可空非终结符集合，迭代到不动点
 */
export function computeNullable(grammar: Grammar): SymbolSet<NonterminalSymbol> {
  const nullable = new SymbolSet<NonterminalSymbol>()
  let changed = true
  while (changed) {
    changed = false
    for (const symbol of grammar.nonterminals) {
      if (nullable.has(symbol)) continue
      const derivesEmpty = grammar
        .alternativesOf(symbol)
        .some(rhs => isEpsilon(rhs) || rhs.every(item => item.type === 'nonterminal' && nullable.has(item)))
      if (derivesEmpty) {
        nullable.add(symbol)
        changed = true
      }
    }
  }
  return nullable
}

/**
 * 对右部中可空非终结符出现位置的每个子集，生成删去这些位置后的右部
 * 第i位为1表示删去第i个可空出现，掩码0即原右部；删空的结果不返回
 */
export function expandNullableOccurrences(
  rhs: readonly GrammarSymbol[],
  nullable: SymbolSet<NonterminalSymbol>
): GrammarSymbol[][] {
  const positions: number[] = []
  rhs.forEach((symbol, index) => {
    if (symbol.type === 'nonterminal' && nullable.has(symbol)) positions.push(index)
  })

  requireCondition(
    positions.length <= MAX_NULLABLE_OCCURRENCES,
    `右部中有 ${positions.length} 个可空出现，超过上限 ${MAX_NULLABLE_OCCURRENCES}`
  )

  const result: GrammarSymbol[][] = []
  for (let mask = 0; mask < 2 ** positions.length; mask++) {
    const removed = new Set(positions.filter((_, bit) => (mask & (1 << bit)) !== 0))
    const kept = rhs.filter((_, index) => !removed.has(index))
    if (kept.length > 0) result.push(kept)
  }
  return result
}

/**
 * 消除ε产生式。生成的文法与原文法产生相同的非空串集合
 */
export function eliminateEpsilon(grammar: Grammar, options: EpsilonEliminationOptions = {}): Grammar {
  const keepStartEpsilon = options.keepStartEpsilon ?? true
  const nullable = computeNullable(grammar)

  const productions: Production[] = []
  for (const lhs of grammar.nonterminals) {
    for (const rhs of grammar.alternativesOf(lhs)) {
      if (isEpsilon(rhs)) continue
      for (const expanded of expandNullableOccurrences(rhs, nullable)) {
        productions.push({ lhs, rhs: expanded })
      }
    }
  }

  if (keepStartEpsilon && nullable.has(grammar.start)) {
    productions.push({ lhs: grammar.start, rhs: EPSILON })
  }

  return grammar.derive(grammar.nonterminals, productions)
}
