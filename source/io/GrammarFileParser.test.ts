import { CollectedErrors, DetailedGrammarError, ErrorType } from '../core/ErrorCollector'
import { alternativesByName } from '../testing/grammarText'
import { GrammarFileParser } from './GrammarFileParser'

function errorsOf(content: string): DetailedGrammarError[] {
  try {
    new GrammarFileParser(content).toGrammar()
  } catch (ex) {
    if (ex instanceof CollectedErrors) return ex.collector.getErrors()
    throw ex
  }
  return []
}

describe('GrammarFileParser', () => {
  it('支持续行和注释', () => {
    const grammar = new GrammarFileParser(
      ['%nonterminals S A   # 两个非终结符', 'S -> a A', '  | b', '# 整行注释', 'A -> ε | c'].join('\n')
    ).toGrammar()
    expect(alternativesByName(grammar)).toEqual({ S: ['a A', 'b'], A: ['ε', 'c'] })
    expect(grammar.terminals.map(symbol => symbol.content)).toEqual(['a', 'b', 'c'])
    expect(grammar.declaredTerminals).toBeUndefined()
  })

  it('eps与ε等价', () => {
    const grammar = new GrammarFileParser('%nonterminals S\nS -> a | eps').toGrammar()
    expect(alternativesByName(grammar)).toEqual({ S: ['a', 'ε'] })
  })

  it('未指定%start时以第一个非终结符为开始符号', () => {
    const parser = new GrammarFileParser('%nonterminals B A\nA -> a\nB -> A')
    expect(parser.startName).toBe('B')
    expect(parser.toGrammar().start.content).toBe('B')
  })

  it('%start指定开始符号', () => {
    const grammar = new GrammarFileParser('%nonterminals B A\n%start A\nA -> a\nB -> A').toGrammar()
    expect(grammar.start.content).toBe('A')
  })

  it('缺少%nonterminals时报告全部错误', () => {
    expect(errorsOf('S -> a').map(error => error.errorType)).toEqual([
      ErrorType.MalformedInput,
      ErrorType.NoStartSymbol,
      ErrorType.UndefinedSymbol,
    ])
  })

  it('ε与其他符号混用', () => {
    const errors = errorsOf('%nonterminals S\nS -> a ε | b')
    expect(errors).toHaveLength(1)
    expect(errors[0].errorType).toBe(ErrorType.MalformedEpsilonUsage)
    expect(errors[0].subject).toBe('a ε')
    expect(errors[0].lineNumber).toBe(2)
  })

  it('使用未声明的终结符', () => {
    const errors = errorsOf('%nonterminals S\n%terminals a\nS -> a b')
    expect(errors.map(error => [error.errorType, error.subject])).toEqual([[ErrorType.UndefinedSymbol, 'b']])
  })

  it('多处错误分别带行号', () => {
    const errors = errorsOf(['%nonterminals S', 'S -> a | ', 'S -> b ε'].join('\n'))
    expect(errors.map(error => [error.errorType, error.lineNumber])).toEqual([
      [ErrorType.MalformedEpsilonUsage, 2],
      [ErrorType.MalformedEpsilonUsage, 3],
    ])
  })

  it('未知指令和缺少箭头的行', () => {
    const errors = errorsOf(['%nonterminals S', '%grammar S', 'S a', 'S -> a'].join('\n'))
    expect(errors.map(error => [error.errorType, error.subject, error.lineNumber])).toEqual([
      [ErrorType.MalformedInput, '%grammar S', 2],
      [ErrorType.MalformedInput, 'S a', 3],
    ])
  })

  it('同时声明为终结符和非终结符', () => {
    const errors = errorsOf(['%nonterminals S A', '%terminals a A', 'S -> a A', 'A -> a'].join('\n'))
    expect(errors.map(error => [error.errorType, error.subject, error.lineNumber])).toEqual([
      [ErrorType.MalformedInput, 'A', 2],
    ])
  })

  it('格式错误的候选式被跳过，其余部分仍可取得', () => {
    const parser = new GrammarFileParser('%nonterminals S\nS -> a ε | b')
    expect(parser.errors.getErrorCount()).toBe(1)
    expect(parser.definition.productions).toHaveLength(1)
  })
})
