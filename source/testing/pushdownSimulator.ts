/**
 * 测试辅助：在栈高度有界的前提下穷举下推自动机的格局，判断是否接受输入
 */

import { AcceptanceMode } from '../core/automata/AutomatonTypes'
import { PushdownAutomaton } from '../core/automata/PushdownAutomaton'
import { EPSILON } from '../core/grammar/GrammarTypes'

interface Configuration {
  state: string
  position: number
  stack: readonly string[] // 首项为栈顶
}

function isAccepted(automaton: PushdownAutomaton, config: Configuration, length: number, mode: AcceptanceMode): boolean {
  if (config.position !== length) return false
  switch (mode) {
    case 'empty-stack':
      return config.stack.length === 0
    case 'empty-stack-in-accepting-state':
      return config.stack.length === 0 && automaton.isAccepting(config.state)
    case 'final-state':
      return automaton.isAccepting(config.state)
  }
}

export function simulateAccepts(
  automaton: PushdownAutomaton,
  word: readonly string[],
  mode: AcceptanceMode,
  maxStack: number = word.length + 2
): boolean {
  const visited = new Set<string>()
  const queue: Configuration[] = [{ state: automaton.startState, position: 0, stack: [automaton.startStackSymbol] }]

  while (queue.length > 0) {
    const config = queue.shift()
    if (config === undefined) break
    const key = JSON.stringify([config.state, config.position, config.stack])
    if (visited.has(key) || config.stack.length > maxStack) continue
    visited.add(key)

    if (isAccepted(automaton, config, word.length, mode)) return true
    if (config.stack.length === 0) continue

    const [top, ...rest] = config.stack
    for (const transition of automaton.transitionsFor(config.state, EPSILON, top)) {
      queue.push({ state: transition.to, position: config.position, stack: [...transition.push, ...rest] })
    }
    if (config.position < word.length) {
      for (const transition of automaton.transitionsFor(config.state, word[config.position], top)) {
        queue.push({ state: transition.to, position: config.position + 1, stack: [...transition.push, ...rest] })
      }
    }
  }
  return false
}
