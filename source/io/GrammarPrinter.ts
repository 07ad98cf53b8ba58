/**
 * 文法输出
 */

import { Grammar } from '../core/grammar/Grammar'
import { formatRightHandSide } from '../core/grammar/GrammarTypes'

export interface FormatOptions {
  withDeclarations?: boolean // 输出 %nonterminals 等声明，结果可再次被GrammarFileParser读入
}

/**
 * 每个非终结符一行，如 A -> a B | ε；没有候选式的非终结符不输出
 */
export function formatProductions(grammar: Grammar): string[] {
  const lines: string[] = []
  for (const symbol of grammar.nonterminals) {
    const alternatives = grammar.alternativesOf(symbol)
    if (alternatives.length === 0) continue
    lines.push(`${symbol.content} -> ${alternatives.map(formatRightHandSide).join(' | ')}`)
  }
  return lines
}

export function formatGrammar(grammar: Grammar, options: FormatOptions = {}): string {
  const lines: string[] = []
  if (options.withDeclarations) {
    lines.push(`%nonterminals ${grammar.nonterminals.map(symbol => symbol.content).join(' ')}`)
    if (grammar.declaredTerminals !== undefined) {
      lines.push(`%terminals ${grammar.declaredTerminals.map(symbol => symbol.content).join(' ')}`.trimEnd())
    }
    lines.push(`%start ${grammar.start.content}`)
  }
  lines.push(...formatProductions(grammar))
  return lines.join('\n') + '\n'
}
