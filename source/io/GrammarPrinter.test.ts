import { convert } from '../converter/PdaToCfgConverter'
import { automatonOf, grammarOf, productionSet } from '../testing/grammarText'
import { formatGrammar, formatProductions } from './GrammarPrinter'

describe('formatGrammar', () => {
  const grammar = grammarOf(`
    %nonterminals S A
    %terminals a b
    S -> a A | ε
    A -> b
  `)

  it('每个非终结符一行', () => {
    expect(formatGrammar(grammar)).toBe('S -> a A | ε\nA -> b\n')
  })

  it('带声明的输出可以再次读入', () => {
    const text = formatGrammar(grammar, { withDeclarations: true })
    expect(text).toBe('%nonterminals S A\n%terminals a b\n%start S\nS -> a A | ε\nA -> b\n')
    expect(productionSet(grammarOf(text))).toEqual(productionSet(grammar))
  })

  it('没有候选式的非终结符只出现在声明中', () => {
    const empty = grammarOf('%nonterminals S A\nS -> a')
    expect(formatGrammar(empty)).toBe('S -> a\n')
    expect(formatGrammar(empty, { withDeclarations: true })).toBe('%nonterminals S A\n%start S\nS -> a\n')
  })
})

describe('formatProductions', () => {
  it('三元组变量以 [p,X,q] 形式输出', () => {
    const automaton = automatonOf(`
      %states q
      %input ( )
      %stack Z X
      %start q Z
      q ( Z -> q X Z
      q ( X -> q X X
      q ) X -> q
      q ε Z -> q
    `)
    expect(formatProductions(convert(automaton, { acceptance: 'empty-stack' }))).toEqual([
      'S -> [q,Z,q]',
      '[q,Z,q] -> ( [q,X,q] [q,Z,q] | ε',
      '[q,X,q] -> ( [q,X,q] [q,X,q] | )',
    ])
  })
})
