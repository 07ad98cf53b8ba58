import { GrammarSymbol, nonterminal, terminal } from '../core/grammar/GrammarTypes'
import { SymbolSet } from '../core/grammar/SymbolSet'
import { alternativesByName, grammarOf } from '../testing/grammarText'
import { ToolkitError } from '../core/utils'
import { MAX_NULLABLE_OCCURRENCES, computeNullable, eliminateEpsilon, expandNullableOccurrences } from './EpsilonEliminator'

const names = (set: { toArray(): GrammarSymbol[] }) => set.toArray().map(symbol => symbol.content)

describe('computeNullable', () => {
  it('没有直接ε产生式的非终结符也能成为可空的', () => {
    const grammar = grammarOf(`
      %nonterminals A B C
      A -> B C
      B -> ε
      C -> ε
    `)
    expect(names(computeNullable(grammar))).toEqual(['B', 'C', 'A'])
  })

  it('沿单链传递可空性直到不动点', () => {
    const grammar = grammarOf(`
      %nonterminals S A B C
      S -> A b
      A -> B
      B -> C
      C -> ε | c
    `)
    expect(names(computeNullable(grammar))).toEqual(['C', 'B', 'A'])
  })

  it('含终结符的候选式不可空', () => {
    const grammar = grammarOf(`
      %nonterminals S
      S -> a S | b
    `)
    expect(computeNullable(grammar).size).toBe(0)
  })
})

describe('expandNullableOccurrences', () => {
  it('枚举可空出现位置的每个子集', () => {
    const A = nonterminal('A')
    const a = terminal('a')
    const b = terminal('b')
    const expanded = expandNullableOccurrences([a, A, b, A], new SymbolSet([A]))
    expect(expanded.map(rhs => rhs.map(symbol => symbol.content).join(' '))).toEqual(['a A b A', 'a b A', 'a A b', 'a b'])
  })

  it('删空的结果不返回', () => {
    const A = nonterminal('A')
    expect(expandNullableOccurrences([A], new SymbolSet([A])).map(rhs => rhs.length)).toEqual([1])
  })

  it('可空出现过多时报告错误而不是丢弃候选式', () => {
    const A = nonterminal('A')
    const rhs = Array.from({ length: MAX_NULLABLE_OCCURRENCES + 1 }, () => A)
    expect(() => expandNullableOccurrences(rhs, new SymbolSet([A]))).toThrow(ToolkitError)
    expect(() => expandNullableOccurrences(rhs, new SymbolSet([A]))).toThrow('超过上限 30')
  })
})

describe('eliminateEpsilon', () => {
  const grammar = grammarOf(`
    %nonterminals A B C
    A -> B C
    B -> ε
    C -> ε
  `)

  it('生成删去可空出现后的候选式，并为可空的开始符号保留ε', () => {
    expect(alternativesByName(eliminateEpsilon(grammar))).toEqual({
      A: ['B C', 'C', 'B', 'ε'],
      B: [],
      C: [],
    })
  })

  it('keepStartEpsilon为false时不保留 start -> ε', () => {
    expect(alternativesByName(eliminateEpsilon(grammar, { keepStartEpsilon: false }))).toEqual({
      A: ['B C', 'C', 'B'],
      B: [],
      C: [],
    })
  })

  it('非开始符号不保留ε', () => {
    const result = eliminateEpsilon(
      grammarOf(`
        %nonterminals S A B C
        S -> A b
        A -> B
        B -> C
        C -> ε | c
      `)
    )
    expect(alternativesByName(result)).toEqual({
      S: ['A b', 'b'],
      A: ['B'],
      B: ['C'],
      C: ['c'],
    })
  })

  it('同一非终结符得到的重复候选式只保留一次', () => {
    const result = eliminateEpsilon(
      grammarOf(`
        %nonterminals S A
        S -> A A
        A -> a | ε
      `)
    )
    expect(alternativesByName(result)).toEqual({ S: ['A A', 'A', 'ε'], A: ['a'] })
  })

  it('不修改输入文法', () => {
    eliminateEpsilon(grammar)
    expect(alternativesByName(grammar)).toEqual({ A: ['B C'], B: ['ε'], C: ['ε'] })
  })
})
