/**
 * 文法定义文件（.cfg）解析器
 *
 * 格式：
 *   %nonterminals S A B     声明非终结符（必需）
 *   %terminals a b          声明终结符（可选，省略时由右部推断）
 *   %start S                开始符号（可选，默认为第一个非终结符）
 *   S -> a A | B | ε        候选式以 | 分隔，符号以空白分隔
 *     | b                   以 | 开头的行续接上一条规则
 * # 之后为注释
 */

import * as fs from 'fs'
import { CollectedErrors, ErrorCollector } from '../core/ErrorCollector'
import { Grammar } from '../core/grammar/Grammar'
import {
  EPSILON,
  GrammarDefinition,
  GrammarSymbol,
  Production,
  RightHandSide,
  nonterminal,
  terminal,
} from '../core/grammar/GrammarTypes'
import { EPSILON_SPELLINGS, splitWords, stripComment } from '../core/utils'

interface RuleLine {
  lhs: string
  alternatives: string[]
  lineNumber: number
}

const ARROW = '->'

/**
 * 解析一个候选式中的符号名，ε只能单独出现
 * @returns 符号名列表；ε返回null；格式错误返回undefined
 */
function parseAlternativeWords(
  text: string,
  lhs: string,
  lineNumber: number,
  errors: ErrorCollector
): string[] | null | undefined {
  const words = splitWords(text)
  const epsilonCount = words.filter(word => EPSILON_SPELLINGS.includes(word)).length
  if (words.length === 0) {
    errors.addMalformedEpsilon(`${lhs} 有空的候选式，空右部必须写作ε`, lhs, lineNumber)
    return undefined
  }
  if (epsilonCount > 0 && words.length > 1) {
    errors.addMalformedEpsilon(`${lhs} 的候选式 "${text.trim()}" 中ε与其他符号混用`, text.trim(), lineNumber)
    return undefined
  }
  return epsilonCount > 0 ? null : words
}

/**
 * 文法定义文件解析器
 */
export class GrammarFileParser {
  private readonly _rawContent: string
  private readonly _errors = new ErrorCollector()

  private _nonterminalNames: string[] | null = null
  private _terminalNames: string[] | null = null
  private _terminalsLineNumber = 0
  private _startName: string | null = null
  private _rules: RuleLine[] = []
  private readonly _definition: GrammarDefinition

  get errors(): ErrorCollector {
    return this._errors
  }

  /**
   * 解析得到的文法定义，格式有误的候选式已被跳过并记录在errors中
   */
  get definition(): GrammarDefinition {
    return this._definition
  }

  get nonterminalNames(): string[] {
    return this._nonterminalNames ?? []
  }

  get startName(): string | null {
    return this._startName ?? this._nonterminalNames?.[0] ?? null
  }

  constructor(content: string) {
    this._rawContent = content.replace(/\r\n/g, '\n')
    this._parseLines()
    this._definition = this._buildDefinition()
  }

  /**
   * 逐行解析指令和产生式
   */
  private _parseLines(): void {
    this._rawContent.split('\n').forEach((rawLine, index) => {
      const lineNumber = index + 1
      const line = stripComment(rawLine).trim()
      if (line.length === 0) return

      if (line.startsWith('%')) {
        this._parseDirective(line, lineNumber)
      } else if (line.startsWith('|')) {
        const previous = this._rules[this._rules.length - 1]
        if (previous === undefined) {
          this._errors.addMalformedInput('续行 | 之前没有产生式', line, lineNumber)
          return
        }
        previous.alternatives.push(...line.slice(1).split('|'))
      } else {
        this._parseRule(line, lineNumber)
      }
    })

    if (this._nonterminalNames === null) {
      this._errors.addMalformedInput('缺少 %nonterminals 声明', '%nonterminals')
    }
  }

  private _parseDirective(line: string, lineNumber: number): void {
    const [directive, ...values] = splitWords(line)
    switch (directive) {
      case '%nonterminals':
        if (this._nonterminalNames !== null) this._errors.addMalformedInput('重复的 %nonterminals 声明', line, lineNumber)
        this._nonterminalNames = values
        break
      case '%terminals':
        if (this._terminalNames !== null) this._errors.addMalformedInput('重复的 %terminals 声明', line, lineNumber)
        this._terminalNames = values
        this._terminalsLineNumber = lineNumber
        break
      case '%start':
        if (values.length !== 1) {
          this._errors.addMalformedInput('%start 需要恰好一个符号', line, lineNumber)
          break
        }
        this._startName = values[0]
        break
      default:
        this._errors.addMalformedInput(`未知的指令 ${directive}`, line, lineNumber)
    }
  }

  private _parseRule(line: string, lineNumber: number): void {
    const arrowIndex = line.indexOf(ARROW)
    if (arrowIndex === -1) {
      this._errors.addMalformedInput(`无法识别的行，产生式需要包含 ${ARROW}`, line, lineNumber)
      return
    }
    const lhsWords = splitWords(line.slice(0, arrowIndex))
    if (lhsWords.length !== 1) {
      this._errors.addMalformedInput('产生式左部必须恰好是一个符号', line, lineNumber)
      return
    }
    this._rules.push({
      lhs: lhsWords[0],
      alternatives: line.slice(arrowIndex + ARROW.length).split('|'),
      lineNumber,
    })
  }

  /**
   * 按声明为符号名加上标签
   */
  private _toSymbol(name: string): GrammarSymbol {
    return this.nonterminalNames.includes(name) ? nonterminal(name) : terminal(name)
  }

  private _buildDefinition(): GrammarDefinition {
    for (const name of this._terminalNames ?? []) {
      if (this.nonterminalNames.includes(name)) {
        this._errors.addMalformedInput(`${name} 同时声明为终结符和非终结符`, name, this._terminalsLineNumber)
      }
    }

    const productions: Production[] = []
    for (const rule of this._rules) {
      for (const alternative of rule.alternatives) {
        const words = parseAlternativeWords(alternative, rule.lhs, rule.lineNumber, this._errors)
        if (words === undefined) continue
        const rhs: RightHandSide = words === null ? EPSILON : words.map(word => this._toSymbol(word))
        productions.push({ lhs: nonterminal(rule.lhs), rhs })
      }
    }

    const start = this.startName
    return {
      nonterminals: this.nonterminalNames.map(nonterminal),
      terminals: this._terminalNames === null ? undefined : this._terminalNames.map(terminal),
      productions,
      start: start === null ? null : nonterminal(start),
    }
  }

  /**
   * 生成文法，格式错误与文法约束错误一并收集后抛出
   */
  toGrammar(): Grammar {
    const definition = this._definition
    const collector = new ErrorCollector()
    collector.absorb(this._errors)
    collector.absorb(Grammar.validate(definition))
    if (collector.hasErrors()) throw new CollectedErrors(collector)
    return new Grammar(definition)
  }
}

/**
 * 从文件读取文法
 */
export function loadGrammarFile(filePath: string): Grammar {
  return new GrammarFileParser(fs.readFileSync(filePath, 'utf-8')).toGrammar()
}
