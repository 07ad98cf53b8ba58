/**
 * 无用符号删除
 * 先删去不可产生终结串的符号，再在其结果上删去不可达的符号，两遍的顺序不能交换
 */

import { Grammar } from '../core/grammar/Grammar'
import { GrammarSymbol, RightHandSide, TerminalSymbol, isEpsilon, symbolKey } from '../core/grammar/GrammarTypes'
import { SymbolSet } from '../core/grammar/SymbolSet'

function consistsOf(rhs: RightHandSide, accepted: (symbol: GrammarSymbol) => boolean): boolean {
  return isEpsilon(rhs) || rhs.every(accepted)
}

/**
 * 计算可产生终结串的符号集合（含全部终结符），迭代到不动点
 */
export function computeGenerating(grammar: Grammar): SymbolSet {
  const generating = new SymbolSet<GrammarSymbol>(grammar.terminals)
  const isGenerating = (symbol: GrammarSymbol) => symbol.type === 'terminal' || generating.has(symbol)

  let changed = true
  while (changed) {
    changed = false
    for (const symbol of grammar.nonterminals) {
      if (generating.has(symbol)) continue
      if (grammar.alternativesOf(symbol).some(rhs => consistsOf(rhs, isGenerating))) {
        generating.add(symbol)
        changed = true
      }
    }
  }
  return generating
}

/**
 * 计算从开始符号可达的符号集合，迭代到不动点
 */
export function computeReachable(grammar: Grammar): SymbolSet {
  const reachable = new SymbolSet<GrammarSymbol>([grammar.start])

  let changed = true
  while (changed) {
    changed = false
    for (const symbol of reachable.toArray()) {
      if (symbol.type !== 'nonterminal') continue
      for (const rhs of grammar.alternativesOf(symbol)) {
        if (isEpsilon(rhs)) continue
        for (const item of rhs) {
          if (reachable.add(item)) changed = true
        }
      }
    }
  }
  return reachable
}

/**
 * 只保留可产生终结串的非终结符及只含这些符号的候选式
 * 开始符号总是保留声明，不可产生时其候选式为空，即语言为空
 */
export function removeNonGenerating(grammar: Grammar): Grammar {
  const generating = computeGenerating(grammar)
  const isStart = (symbol: GrammarSymbol) => symbolKey(symbol) === symbolKey(grammar.start)
  const isGenerating = (symbol: GrammarSymbol) => symbol.type === 'terminal' || generating.has(symbol)

  const nonterminals = grammar.nonterminals.filter(symbol => generating.has(symbol) || isStart(symbol))
  const productions = grammar.productions.filter(
    production => generating.has(production.lhs) && consistsOf(production.rhs, isGenerating)
  )
  return grammar.derive(nonterminals, productions)
}

/**
 * 只保留从开始符号可达的非终结符；声明了终结符时也只保留可达的终结符
 */
export function removeUnreachable(grammar: Grammar): Grammar {
  const reachable = computeReachable(grammar)
  const nonterminals = grammar.nonterminals.filter(symbol => reachable.has(symbol))
  const productions = grammar.productions.filter(production => reachable.has(production.lhs))
  const declared = grammar.declaredTerminals
  const terminals: readonly TerminalSymbol[] | undefined = declared?.filter(symbol => reachable.has(symbol))
  return grammar.derive(nonterminals, productions, terminals)
}

/**
 * 删除无用符号
 */
export function pruneUseless(grammar: Grammar): Grammar {
  return removeUnreachable(removeNonGenerating(grammar))
}
