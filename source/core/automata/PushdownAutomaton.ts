/**
 * 下推自动机
 * 构造后不可变
 */

import { ErrorCollector } from '../ErrorCollector'
import { requireCondition } from '../utils'
import {
  AutomatonDefinition,
  InputSymbol,
  PushdownTransition,
  formatTransition,
  inputSymbolName,
  isEpsilonMove,
} from './AutomatonTypes'

function transitionKey(transition: PushdownTransition): string {
  return JSON.stringify([
    transition.from,
    inputSymbolName(transition.input),
    isEpsilonMove(transition.input),
    transition.stackTop,
    transition.to,
    transition.push,
  ])
}

function relationKey(state: string, input: InputSymbol, stackTop: string): string {
  return JSON.stringify([state, inputSymbolName(input), isEpsilonMove(input), stackTop])
}

function unique(values: readonly string[]): readonly string[] {
  return Object.freeze([...new Set(values)])
}

export class PushdownAutomaton {
  private readonly _states: readonly string[]
  private readonly _inputAlphabet: readonly string[]
  private readonly _stackAlphabet: readonly string[]
  private readonly _transitions: readonly PushdownTransition[]
  private readonly _startState: string
  private readonly _startStackSymbol: string
  private readonly _acceptingStates: readonly string[]
  private readonly _relation = new Map<string, PushdownTransition[]>()

  get states(): readonly string[] {
    return this._states
  }

  get inputAlphabet(): readonly string[] {
    return this._inputAlphabet
  }

  get stackAlphabet(): readonly string[] {
    return this._stackAlphabet
  }

  /**
   * 去重后的全部转移，保持声明顺序
   */
  get transitions(): readonly PushdownTransition[] {
    return this._transitions
  }

  get startState(): string {
    return this._startState
  }

  get startStackSymbol(): string {
    return this._startStackSymbol
  }

  get acceptingStates(): readonly string[] {
    return this._acceptingStates
  }

  /**
   * 构造下推自动机，校验失败时抛出第一个错误
   */
  constructor(definition: AutomatonDefinition) {
    PushdownAutomaton.validate(definition).throwIfErrors()
    const { startState, startStackSymbol } = definition
    requireCondition(startState !== null, '下推自动机没有指定开始状态')
    requireCondition(startStackSymbol !== null, '下推自动机没有指定初始栈符号')

    this._states = unique(definition.states)
    this._inputAlphabet = unique(definition.inputAlphabet)
    this._stackAlphabet = unique(definition.stackAlphabet)
    this._startState = startState
    this._startStackSymbol = startStackSymbol
    this._acceptingStates = unique(definition.acceptingStates)

    const transitions: PushdownTransition[] = []
    const seen = new Set<string>()
    for (const transition of definition.transitions) {
      const key = transitionKey(transition)
      if (seen.has(key)) continue
      seen.add(key)
      const frozen = Object.freeze({ ...transition, push: Object.freeze([...transition.push]) })
      transitions.push(frozen)

      const relation = relationKey(frozen.from, frozen.input, frozen.stackTop)
      this._relation.set(relation, [...(this._relation.get(relation) ?? []), frozen])
    }
    this._transitions = Object.freeze(transitions)
  }

  /**
   * 检查自动机定义，收集所有违反约束之处
   */
  static validate(definition: AutomatonDefinition): ErrorCollector {
    const collector = new ErrorCollector()
    const states = new Set(definition.states)
    const inputs = new Set(definition.inputAlphabet)
    const stackSymbols = new Set(definition.stackAlphabet)

    if (definition.startState === null) {
      collector.addNoStartSymbol('下推自动机没有指定开始状态')
    } else if (!states.has(definition.startState)) {
      collector.addNoStartSymbol(`开始状态 ${definition.startState} 未声明`, definition.startState)
    }
    if (definition.startStackSymbol === null) {
      collector.addNoStartSymbol('下推自动机没有指定初始栈符号')
    } else if (!stackSymbols.has(definition.startStackSymbol)) {
      collector.addNoStartSymbol(`初始栈符号 ${definition.startStackSymbol} 未声明`, definition.startStackSymbol)
    }

    for (const state of definition.acceptingStates) {
      if (!states.has(state)) collector.addUndefinedSymbol(`接受状态 ${state} 未声明`, state)
    }

    for (const transition of definition.transitions) {
      const text = formatTransition(transition)
      for (const state of [transition.from, transition.to]) {
        if (!states.has(state)) collector.addUndefinedSymbol(`转移 ${text} 中的状态 ${state} 未声明`, text)
      }
      if (!isEpsilonMove(transition.input) && !inputs.has(transition.input)) {
        collector.addUndefinedSymbol(`转移 ${text} 中的输入符号 ${transition.input} 未声明`, text)
      }
      for (const symbol of [transition.stackTop, ...transition.push]) {
        if (!stackSymbols.has(symbol)) collector.addUndefinedSymbol(`转移 ${text} 中的栈符号 ${symbol} 未声明`, text)
      }
    }
    return collector
  }

  /**
   * 查询转移关系：在state读入input（或ε）且栈顶为stackTop时可选的全部转移
   */
  transitionsFor(state: string, input: InputSymbol, stackTop: string): readonly PushdownTransition[] {
    return this._relation.get(relationKey(state, input, stackTop)) ?? []
  }

  isAccepting(state: string): boolean {
    return this._acceptingStates.includes(state)
  }
}
