/**
 * 单产生式消除
 */

import { Grammar } from '../core/grammar/Grammar'
import { NonterminalSymbol, Production, isEpsilon, isUnitAlternative, symbolKey } from '../core/grammar/GrammarTypes'
import { SymbolSet } from '../core/grammar/SymbolSet'

/**
 * 计算每个非终结符沿零条或多条单产生式能到达的非终结符
 * @returns 以symbolKey为键，值按发现顺序排列，首项为该非终结符自身
 */
export function computeUnitClosure(grammar: Grammar): Map<string, NonterminalSymbol[]> {
  const closure = new Map<string, NonterminalSymbol[]>()
  for (const symbol of grammar.nonterminals) {
    const reached = new SymbolSet<NonterminalSymbol>([symbol])
    const worklist = [symbol]
    while (worklist.length > 0) {
      const current = worklist.shift()
      if (current === undefined) break
      for (const rhs of grammar.alternativesOf(current)) {
        if (isUnitAlternative(rhs) && reached.add(rhs[0])) worklist.push(rhs[0])
      }
    }
    closure.set(symbolKey(symbol), reached.toArray())
  }
  return closure
}

/**
 * 消除单产生式：A的新候选式为其单闭包中各非终结符的非单候选式之并
 * ε候选式只保留在其所属的非终结符上
 */
export function eliminateUnits(grammar: Grammar): Grammar {
  const closure = computeUnitClosure(grammar)
  const productions: Production[] = []

  for (const lhs of grammar.nonterminals) {
    for (const reached of closure.get(symbolKey(lhs)) ?? []) {
      const isSelf = symbolKey(reached) === symbolKey(lhs)
      for (const rhs of grammar.alternativesOf(reached)) {
        if (isUnitAlternative(rhs)) continue
        if (isEpsilon(rhs) && !isSelf) continue
        productions.push({ lhs, rhs })
      }
    }
  }

  return grammar.derive(grammar.nonterminals, productions)
}
