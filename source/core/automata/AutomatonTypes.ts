/**
 * 下推自动机基础类型定义
 */

import { Epsilon } from '../grammar/GrammarTypes'

/**
 * 输入符号：终结符，或表示ε转移的ε标记
 */
export type InputSymbol = string | Epsilon

/**
 * 状态转移 (from, input, stackTop) -> (to, push)
 */
export interface PushdownTransition {
  readonly from: string
  readonly input: InputSymbol
  readonly stackTop: string // 被弹出的栈顶符号
  readonly to: string
  readonly push: readonly string[] // 压入的符号串，首项位于新栈顶；为空即只弹栈
}

/**
 * 接受方式
 */
export type AcceptanceMode = 'empty-stack' | 'empty-stack-in-accepting-state' | 'final-state'

export const ACCEPTANCE_MODES: readonly AcceptanceMode[] = ['empty-stack', 'empty-stack-in-accepting-state', 'final-state']

export function parseAcceptanceMode(name: string): AcceptanceMode | null {
  return ACCEPTANCE_MODES.find(mode => mode === name) ?? null
}

/**
 * 构造下推自动机所需的原始数据
 */
export interface AutomatonDefinition {
  states: readonly string[]
  inputAlphabet: readonly string[]
  stackAlphabet: readonly string[]
  transitions: readonly PushdownTransition[]
  startState: string | null
  startStackSymbol: string | null
  acceptingStates: readonly string[]
}

export function isEpsilonMove(input: InputSymbol): input is Epsilon {
  return typeof input !== 'string'
}

export function inputSymbolName(input: InputSymbol): string {
  return isEpsilonMove(input) ? 'ε' : input
}

/**
 * 转移的文本形式，如 q0 a Z -> q1 A Z
 */
export function formatTransition(transition: PushdownTransition): string {
  const target = [transition.to, ...transition.push].join(' ')
  return `${transition.from} ${inputSymbolName(transition.input)} ${transition.stackTop} -> ${target}`
}
