import { alternativesByName, grammarOf, normalFormViolations, productionSet } from '../testing/grammarText'
import { sentencesUpTo } from '../testing/languageSample'
import { normalize, normalizeWithStages } from './NormalizationPipeline'

const EXPRESSION = `
  %nonterminals E T F R U
  %terminals + * ( ) id
  E -> E + T | T
  T -> T * F | F
  F -> ( E ) | id | R
  R -> R id
  U -> id
`

const GRAMMARS = [
  EXPRESSION,
  `
    %nonterminals S A B C
    S -> A B C | a S
    A -> a A | ε
    B -> b B | C
    C -> c | ε
  `,
  `
    %nonterminals S X Y Z
    S -> X | Y a
    X -> X b
    Y -> Z | ε
    Z -> Y c | S
  `,
  `
    %nonterminals S A
    S -> A S A | a A | ε
    A -> S | b
  `,
]

describe('normalize', () => {
  it('规范化表达式文法', () => {
    expect(alternativesByName(normalize(grammarOf(EXPRESSION)))).toEqual({
      E: ['E + T', 'T * F', '( E )', 'id'],
      T: ['T * F', '( E )', 'id'],
      F: ['( E )', 'id'],
    })
  })

  it('normalizeWithStages按顺序返回各阶段的文法', () => {
    const grammar = grammarOf(EXPRESSION)
    const stages = normalizeWithStages(grammar)
    expect(stages.map(result => result.stage)).toEqual(['epsilon', 'unit', 'useless'])
    expect(productionSet(stages[0].grammar)).toEqual(productionSet(grammar))
    expect(alternativesByName(stages[1].grammar).E).toEqual(['E + T', 'T * F', '( E )', 'id', 'R id'])
    expect(productionSet(stages[2].grammar)).toEqual(productionSet(normalize(grammar)))
  })

  it.each(GRAMMARS)('结果满足规范形式 %#', text => {
    expect(normalFormViolations(normalize(grammarOf(text)))).toEqual([])
  })

  it.each(GRAMMARS)('幂等 %#', text => {
    const once = normalize(grammarOf(text))
    expect(productionSet(normalize(once))).toEqual(productionSet(once))
  })

  it.each(GRAMMARS)('不改变产生的语言 %#', text => {
    const grammar = grammarOf(text)
    expect(sentencesUpTo(normalize(grammar), 5)).toEqual(sentencesUpTo(grammar, 5))
  })

  it('keepStartEpsilon为false时只去掉空串', () => {
    const grammar = grammarOf(GRAMMARS[3])
    const withoutEmpty = sentencesUpTo(grammar, 4).filter(word => word.length > 0)
    expect(sentencesUpTo(normalize(grammar, { keepStartEpsilon: false }), 4)).toEqual(withoutEmpty)
  })
})
