/**
 * 上下文无关文法
 * 构造后不可变，各处理阶段都返回新的文法对象
 */

import { ErrorCollector } from '../ErrorCollector'
import { requireCondition } from '../utils'
import {
  GrammarDefinition,
  GrammarSymbol,
  NonterminalSymbol,
  Production,
  RightHandSide,
  TerminalSymbol,
  formatRightHandSide,
  isEpsilon,
  rhsKey,
  symbolKey,
} from './GrammarTypes'
import { SymbolSet } from './SymbolSet'

export class Grammar {
  private readonly _nonterminals: readonly NonterminalSymbol[]
  private readonly _terminals: readonly TerminalSymbol[]
  private readonly _terminalsDeclared: boolean
  private readonly _alternatives: Map<string, readonly RightHandSide[]>
  private readonly _start: NonterminalSymbol

  get nonterminals(): readonly NonterminalSymbol[] {
    return this._nonterminals
  }

  /**
   * 终结符：显式声明的，或从右部按出现顺序推断的
   */
  get terminals(): readonly TerminalSymbol[] {
    return this._terminals
  }

  /**
   * 显式声明的终结符，未声明时为undefined
   */
  get declaredTerminals(): readonly TerminalSymbol[] | undefined {
    return this._terminalsDeclared ? this._terminals : undefined
  }

  get start(): NonterminalSymbol {
    return this._start
  }

  /**
   * 按非终结符声明顺序展开的全部产生式
   */
  get productions(): Production[] {
    const result: Production[] = []
    for (const lhs of this._nonterminals) {
      for (const rhs of this.alternativesOf(lhs)) result.push({ lhs, rhs })
    }
    return result
  }

  /**
   * 构造文法，校验失败时抛出第一个错误
   */
  constructor(definition: GrammarDefinition) {
    const collector = Grammar.validate(definition)
    collector.throwIfErrors()
    const start = definition.start
    requireCondition(start !== null, '文法没有指定开始符号')

    this._nonterminals = Object.freeze(new SymbolSet(definition.nonterminals).toArray())
    this._start = start

    this._alternatives = new Map()
    for (const symbol of this._nonterminals) this._alternatives.set(symbolKey(symbol), [])
    const seen = new Set<string>()
    for (const { lhs, rhs } of definition.productions) {
      const key = symbolKey(lhs) + rhsKey(rhs)
      if (seen.has(key)) continue
      seen.add(key)
      const list = this._alternatives.get(symbolKey(lhs))
      if (list) this._alternatives.set(symbolKey(lhs), [...list, isEpsilon(rhs) ? rhs : Object.freeze([...rhs])])
    }
    for (const [key, list] of this._alternatives) this._alternatives.set(key, Object.freeze(list))

    this._terminalsDeclared = definition.terminals !== undefined
    if (definition.terminals !== undefined) {
      this._terminals = Object.freeze(new SymbolSet(definition.terminals).toArray())
    } else {
      const inferred = new SymbolSet<TerminalSymbol>()
      for (const { rhs } of definition.productions) {
        if (isEpsilon(rhs)) continue
        for (const symbol of rhs) if (symbol.type === 'terminal') inferred.add(symbol)
      }
      this._terminals = Object.freeze(inferred.toArray())
    }
  }

  /**
   * 检查文法定义，收集所有违反约束之处
   */
  static validate(definition: GrammarDefinition): ErrorCollector {
    const collector = new ErrorCollector()
    const nonterminals = new SymbolSet(definition.nonterminals)
    const terminals = definition.terminals === undefined ? null : new SymbolSet(definition.terminals)

    if (definition.start === null) {
      collector.addNoStartSymbol('文法没有指定开始符号')
    } else if (!nonterminals.has(definition.start)) {
      collector.addNoStartSymbol(`开始符号 ${definition.start.content} 不是已声明的非终结符`, definition.start.content)
    }

    for (const { lhs, rhs } of definition.productions) {
      const production = `${lhs.content} -> ${formatRightHandSide(rhs)}`
      if (!nonterminals.has(lhs)) {
        collector.addUndefinedSymbol(`产生式 ${production} 的左部 ${lhs.content} 未声明为非终结符`, lhs.content)
      }
      if (isEpsilon(rhs)) continue
      if (rhs.length === 0) {
        collector.addMalformedEpsilon(`产生式 ${lhs.content} 的右部为空序列，空右部必须写作ε`, production)
        continue
      }
      for (const symbol of rhs) {
        if (symbol.type !== 'terminal' && symbol.type !== 'nonterminal') {
          collector.addMalformedEpsilon(`产生式 ${lhs.content} 的右部中ε与其他符号混用`, lhs.content)
        } else if (!Grammar.isDeclared(symbol, nonterminals, terminals)) {
          collector.addUndefinedSymbol(`产生式 ${production} 中的符号 ${symbol.content} 未声明`, symbol.content)
        }
      }
    }
    return collector
  }

  private static isDeclared(
    symbol: GrammarSymbol,
    nonterminals: SymbolSet<NonterminalSymbol>,
    terminals: SymbolSet<TerminalSymbol> | null
  ): boolean {
    if (symbol.type === 'nonterminal') return nonterminals.has(symbol)
    return terminals === null || terminals.has(symbol)
  }

  /**
   * 获取非终结符的全部候选式
   */
  alternativesOf(symbol: NonterminalSymbol): readonly RightHandSide[] {
    return this._alternatives.get(symbolKey(symbol)) ?? []
  }

  hasNonterminal(symbol: GrammarSymbol): symbol is NonterminalSymbol {
    return symbol.type === 'nonterminal' && this._alternatives.has(symbolKey(symbol))
  }

  /**
   * 以新的非终结符和产生式构造文法，开始符号沿用当前文法
   * @param terminals 终结符声明，默认沿用当前文法的声明
   */
  derive(
    nonterminals: readonly NonterminalSymbol[],
    productions: readonly Production[],
    terminals: readonly TerminalSymbol[] | undefined = this.declaredTerminals
  ): Grammar {
    return new Grammar({
      nonterminals,
      terminals,
      productions,
      start: this._start,
    })
  }
}
