/**
 * 下推自动机到上下文无关文法的转换
 * 文法变量为三元组 [p, X, q]：从状态p、栈顶X出发，读完对应的串后到达状态q且X恰被弹出
 */

import { AcceptanceMode, PushdownTransition, isEpsilonMove } from '../core/automata/AutomatonTypes'
import { PushdownAutomaton } from '../core/automata/PushdownAutomaton'
import { DetailedGrammarError, ErrorType } from '../core/ErrorCollector'
import { Grammar } from '../core/grammar/Grammar'
import {
  EPSILON,
  GrammarSymbol,
  NonterminalSymbol,
  Production,
  isEpsilon,
  nonterminal,
  terminal,
  tripleNonterminal,
} from '../core/grammar/GrammarTypes'
import { SymbolSet } from '../core/grammar/SymbolSet'
import { freshName } from '../core/utils'

export interface ConversionOptions {
  acceptance?: AcceptanceMode
  startName?: string // 新开始符号的名字，默认为S；与终结符或三元组重名时追加撇号
}

/**
 * 确定接受方式。未指定时只有恰好一个接受状态才能确定
 */
export function resolveAcceptance(automaton: PushdownAutomaton, acceptance?: AcceptanceMode): AcceptanceMode {
  if (acceptance !== undefined) return acceptance
  if (automaton.acceptingStates.length === 1) return 'empty-stack-in-accepting-state'
  throw new DetailedGrammarError(
    ErrorType.AmbiguousAcceptance,
    `下推自动机有 ${automaton.acceptingStates.length} 个接受状态，需要指定接受方式`,
    automaton.acceptingStates.join(' ')
  )
}

/**
 * 按状态声明顺序以字典序枚举长度为length的全部状态元组
 */
export function stateTuples(states: readonly string[], length: number): string[][] {
  let tuples: string[][] = [[]]
  for (let i = 0; i < length; i++) {
    tuples = tuples.flatMap(prefix => states.map(state => [...prefix, state]))
  }
  return tuples
}

/**
 * 一条转移对应的全部产生式
 */
export function productionsForTransition(transition: PushdownTransition, states: readonly string[]): Production[] {
  const { from, input, stackTop, to, push } = transition
  const lead: GrammarSymbol[] = isEpsilonMove(input) ? [] : [terminal(input)]

  if (push.length === 0) {
    return [{ lhs: tripleNonterminal(from, stackTop, to), rhs: lead.length > 0 ? lead : EPSILON }]
  }

  // 中间状态 r1 … rk 取遍所有组合，rk 即最终到达的状态
  return stateTuples(states, push.length).map(tuple => {
    const chain = push.map((symbol, index) => tripleNonterminal(index === 0 ? to : tuple[index - 1], symbol, tuple[index]))
    return { lhs: tripleNonterminal(from, stackTop, tuple[tuple.length - 1]), rhs: [...lead, ...chain] }
  })
}

/**
 * 将按终态接受的自动机改写为按空栈接受的等价自动机
 * 新开始状态压入新的栈底符号，各接受状态经ε转移进入清栈状态
 */
export function toEmptyStackAutomaton(automaton: PushdownAutomaton): PushdownAutomaton {
  const start = freshName('p0', automaton.states)
  const drain = freshName('pe', [...automaton.states, start])
  const bottom = freshName('X0', automaton.stackAlphabet)
  const stackAlphabet = [...automaton.stackAlphabet, bottom]

  const transitions: PushdownTransition[] = [
    { from: start, input: EPSILON, stackTop: bottom, to: automaton.startState, push: [automaton.startStackSymbol, bottom] },
    ...automaton.transitions,
  ]
  for (const state of automaton.acceptingStates) {
    for (const symbol of stackAlphabet) {
      transitions.push({ from: state, input: EPSILON, stackTop: symbol, to: drain, push: [] })
    }
  }
  for (const symbol of stackAlphabet) {
    transitions.push({ from: drain, input: EPSILON, stackTop: symbol, to: drain, push: [] })
  }

  return new PushdownAutomaton({
    states: [...automaton.states, start, drain],
    inputAlphabet: automaton.inputAlphabet,
    stackAlphabet,
    transitions,
    startState: start,
    startStackSymbol: bottom,
    acceptingStates: [drain],
  })
}

/**
 * 将下推自动机转换为等价的上下文无关文法
 */
export function convert(automaton: PushdownAutomaton, options: ConversionOptions = {}): Grammar {
  const acceptance = resolveAcceptance(automaton, options.acceptance)
  if (acceptance === 'final-state') {
    return convert(toEmptyStackAutomaton(automaton), { ...options, acceptance: 'empty-stack' })
  }

  const { startState, startStackSymbol } = automaton
  const startTriple = (to: string) => tripleNonterminal(startState, startStackSymbol, to)

  const transitionProductions: Production[] = []
  for (const transition of automaton.transitions) {
    transitionProductions.push(...productionsForTransition(transition, automaton.states))
  }

  let start: NonterminalSymbol
  const startProductions: Production[] = []
  if (acceptance === 'empty-stack-in-accepting-state' && automaton.acceptingStates.length === 1) {
    start = startTriple(automaton.acceptingStates[0])
  } else {
    const targets = acceptance === 'empty-stack' ? automaton.states : automaton.acceptingStates
    // 新开始符号的显示名不能与终结符或三元组重名，否则输出的文法无法按原意读回
    const usedNames = [
      ...automaton.inputAlphabet,
      ...targets.map(target => startTriple(target).content),
      ...transitionProductions.flatMap(({ lhs, rhs }) => [lhs, ...(isEpsilon(rhs) ? [] : rhs)].map(symbol => symbol.content)),
    ]
    start = nonterminal(freshName(options.startName ?? 'S', usedNames))
    for (const target of targets) startProductions.push({ lhs: start, rhs: [startTriple(target)] })
  }

  const productions = [...startProductions, ...transitionProductions]

  // 非终结符按首次出现的顺序声明
  const nonterminals = new SymbolSet<NonterminalSymbol>([start])
  for (const { lhs, rhs } of productions) {
    nonterminals.add(lhs)
    if (isEpsilon(rhs)) continue
    for (const symbol of rhs) if (symbol.type === 'nonterminal') nonterminals.add(symbol)
  }

  return new Grammar({
    nonterminals: nonterminals.toArray(),
    terminals: automaton.inputAlphabet.map(terminal),
    productions,
    start,
  })
}
