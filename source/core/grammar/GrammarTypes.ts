/**
 * 文法相关的类型定义
 */

/**
 * 三元组变量 [p, X, q]，由下推自动机转换产生
 */
export interface TripleVariable {
  readonly from: string
  readonly stackSymbol: string
  readonly to: string
}

export interface TerminalSymbol {
  readonly type: 'terminal'
  readonly content: string
}

export interface NonterminalSymbol {
  readonly type: 'nonterminal'
  readonly content: string
  readonly triple?: TripleVariable
}

/**
 * 语法符号，类型由标签显式给出
 */
export type GrammarSymbol = TerminalSymbol | NonterminalSymbol

/**
 * ε标记，与任何终结符、非终结符都不相同
 */
export const EPSILON = Object.freeze({ type: 'epsilon' as const })

export type Epsilon = typeof EPSILON

/**
 * 产生式右部：非空符号序列，或ε标记
 */
export type RightHandSide = readonly GrammarSymbol[] | Epsilon

export function terminal(content: string): TerminalSymbol {
  return Object.freeze({ type: 'terminal', content })
}

export function nonterminal(content: string): NonterminalSymbol {
  return Object.freeze({ type: 'nonterminal', content })
}

/**
 * 创建三元组变量对应的非终结符，显示名为 [p,X,q]
 */
export function tripleNonterminal(from: string, stackSymbol: string, to: string): NonterminalSymbol {
  return Object.freeze({
    type: 'nonterminal',
    content: `[${from},${stackSymbol},${to}]`,
    triple: Object.freeze({ from, stackSymbol, to }),
  })
}

export function isEpsilon(rhs: RightHandSide): rhs is Epsilon {
  return !Array.isArray(rhs)
}

export function isNonterminal(symbol: GrammarSymbol): symbol is NonterminalSymbol {
  return symbol.type === 'nonterminal'
}

export function isTerminal(symbol: GrammarSymbol): symbol is TerminalSymbol {
  return symbol.type === 'terminal'
}

/**
 * 符号的身份键。三元组按三个分量编码，不依赖显示名拼接
 */
export function symbolKey(symbol: GrammarSymbol): string {
  if (symbol.type === 'terminal') return JSON.stringify(['t', symbol.content])
  if (symbol.triple) return JSON.stringify(['v', symbol.triple.from, symbol.triple.stackSymbol, symbol.triple.to])
  return JSON.stringify(['n', symbol.content])
}

/**
 * 右部的身份键，用于去重
 */
export function rhsKey(rhs: RightHandSide): string {
  if (isEpsilon(rhs)) return 'ε'
  return JSON.stringify(rhs.map(symbolKey))
}

/**
 * 单产生式：右部恰为一个非终结符
 */
export function isUnitAlternative(rhs: RightHandSide): rhs is readonly [NonterminalSymbol] {
  return !isEpsilon(rhs) && rhs.length === 1 && isNonterminal(rhs[0])
}

/**
 * 产生式
 */
export interface Production {
  readonly lhs: NonterminalSymbol
  readonly rhs: RightHandSide
}

/**
 * 构造文法所需的原始数据
 */
export interface GrammarDefinition {
  nonterminals: readonly NonterminalSymbol[]
  terminals?: readonly TerminalSymbol[] // 省略时由右部推断
  productions: readonly Production[]
  start: NonterminalSymbol | null
}

/**
 * 右部的文本形式，符号间以空格分隔
 */
export function formatRightHandSide(rhs: RightHandSide): string {
  if (isEpsilon(rhs)) return 'ε'
  return rhs.map(symbol => symbol.content).join(' ')
}
