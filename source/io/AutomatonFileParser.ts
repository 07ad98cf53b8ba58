/**
 * 下推自动机定义文件（.pda）解析器
 *
 * 格式：
 *   %states q0 q1
 *   %input a b
 *   %stack Z A
 *   %start q0 Z             开始状态与初始栈符号
 *   %accept q1              接受状态（可选，可为多个）
 *   %acceptance final-state 接受方式（可选）
 *   q0 a Z -> q0 A Z        当前状态 输入 栈顶 -> 下一状态 压入串（首个为新栈顶）
 *   q1 ε Z -> q1            压入串为空即只弹栈，输入ε表示ε转移
 */

import * as fs from 'fs'
import { AcceptanceMode, AutomatonDefinition, InputSymbol, PushdownTransition, parseAcceptanceMode, ACCEPTANCE_MODES } from '../core/automata/AutomatonTypes'
import { PushdownAutomaton } from '../core/automata/PushdownAutomaton'
import { CollectedErrors, ErrorCollector } from '../core/ErrorCollector'
import { EPSILON } from '../core/grammar/GrammarTypes'
import { EPSILON_SPELLINGS, splitWords, stripComment } from '../core/utils'

/**
 * 自动机文件的解析结果
 */
export interface AutomatonFile {
  automaton: PushdownAutomaton
  acceptance?: AcceptanceMode
}

const ARROW = '->'

function isEpsilonWord(word: string): boolean {
  return EPSILON_SPELLINGS.includes(word)
}

/**
 * 下推自动机定义文件解析器
 */
export class AutomatonFileParser {
  private readonly _rawContent: string
  private readonly _errors = new ErrorCollector()

  private _states: string[] = []
  private _inputAlphabet: string[] = []
  private _stackAlphabet: string[] = []
  private _transitions: PushdownTransition[] = []
  private _startState: string | null = null
  private _startStackSymbol: string | null = null
  private _acceptingStates: string[] = []
  private _acceptance: AcceptanceMode | undefined
  private readonly _seenDirectives = new Set<string>()

  get errors(): ErrorCollector {
    return this._errors
  }

  get acceptance(): AcceptanceMode | undefined {
    return this._acceptance
  }

  get definition(): AutomatonDefinition {
    return {
      states: this._states,
      inputAlphabet: this._inputAlphabet,
      stackAlphabet: this._stackAlphabet,
      transitions: this._transitions,
      startState: this._startState,
      startStackSymbol: this._startStackSymbol,
      acceptingStates: this._acceptingStates,
    }
  }

  constructor(content: string) {
    this._rawContent = content.replace(/\r\n/g, '\n')
    this._rawContent.split('\n').forEach((rawLine, index) => {
      const line = stripComment(rawLine).trim()
      if (line.length === 0) return
      if (line.startsWith('%')) {
        this._parseDirective(line, index + 1)
      } else {
        this._parseTransition(line, index + 1)
      }
    })
  }

  private _parseDirective(line: string, lineNumber: number): void {
    const [directive, ...values] = splitWords(line)
    if (this._seenDirectives.has(directive)) {
      this._errors.addMalformedInput(`重复的 ${directive} 声明`, line, lineNumber)
      return
    }
    this._seenDirectives.add(directive)

    switch (directive) {
      case '%states':
        this._states = values
        break
      case '%input':
        if (values.some(isEpsilonWord)) {
          this._errors.addMalformedEpsilon('输入字母表中不能包含ε', line, lineNumber)
        }
        this._inputAlphabet = values.filter(value => !isEpsilonWord(value))
        break
      case '%stack':
        this._stackAlphabet = values
        break
      case '%start':
        if (values.length !== 2) {
          this._errors.addMalformedInput('%start 需要开始状态和初始栈符号两项', line, lineNumber)
          break
        }
        this._startState = values[0]
        this._startStackSymbol = values[1]
        break
      case '%accept':
        this._acceptingStates = values
        break
      case '%acceptance': {
        const mode = values.length === 1 ? parseAcceptanceMode(values[0]) : null
        if (mode === null) {
          this._errors.addMalformedInput(`%acceptance 必须是 ${ACCEPTANCE_MODES.join(' / ')} 之一`, line, lineNumber)
          break
        }
        this._acceptance = mode
        break
      }
      default:
        this._errors.addMalformedInput(`未知的指令 ${directive}`, line, lineNumber)
    }
  }

  private _parseTransition(line: string, lineNumber: number): void {
    const arrowIndex = line.indexOf(ARROW)
    if (arrowIndex === -1) {
      this._errors.addMalformedInput(`无法识别的行，转移需要包含 ${ARROW}`, line, lineNumber)
      return
    }
    const source = splitWords(line.slice(0, arrowIndex))
    const target = splitWords(line.slice(arrowIndex + ARROW.length))
    if (source.length !== 3 || target.length === 0) {
      this._errors.addMalformedInput('转移格式应为：状态 输入 栈顶 -> 下一状态 压入串', line, lineNumber)
      return
    }

    const [from, inputWord, stackTop] = source
    const [to, ...pushWords] = target
    if (isEpsilonWord(from) || isEpsilonWord(stackTop) || isEpsilonWord(to)) {
      this._errors.addMalformedEpsilon('状态和栈顶不能是ε', line, lineNumber)
      return
    }
    if (pushWords.some(isEpsilonWord) && pushWords.length > 1) {
      this._errors.addMalformedEpsilon('压入串中ε与其他符号混用', line, lineNumber)
      return
    }

    const input: InputSymbol = isEpsilonWord(inputWord) ? EPSILON : inputWord
    const push = pushWords.filter(word => !isEpsilonWord(word))
    this._transitions.push({ from, input, stackTop, to, push })
  }

  /**
   * 生成自动机，格式错误与自动机约束错误一并收集后抛出
   */
  toAutomatonFile(): AutomatonFile {
    const definition = this.definition
    const collector = new ErrorCollector()
    collector.absorb(this._errors)
    collector.absorb(PushdownAutomaton.validate(definition))
    if (collector.hasErrors()) throw new CollectedErrors(collector)
    return { automaton: new PushdownAutomaton(definition), acceptance: this._acceptance }
  }
}

/**
 * 从文件读取下推自动机
 */
export function loadAutomatonFile(filePath: string): AutomatonFile {
  return new AutomatonFileParser(fs.readFileSync(filePath, 'utf-8')).toAutomatonFile()
}
