/**
 * 按身份键去重、保持插入顺序的符号集合
 */

import { GrammarSymbol, symbolKey } from './GrammarTypes'

export class SymbolSet<T extends GrammarSymbol = GrammarSymbol> implements Iterable<T> {
  private readonly _items = new Map<string, T>()

  constructor(symbols: Iterable<T> = []) {
    for (const symbol of symbols) this.add(symbol)
  }

  get size(): number {
    return this._items.size
  }

  /**
   * 加入符号，返回集合是否因此变化
   */
  add(symbol: T): boolean {
    const key = symbolKey(symbol)
    if (this._items.has(key)) return false
    this._items.set(key, symbol)
    return true
  }

  has(symbol: GrammarSymbol): boolean {
    return this._items.has(symbolKey(symbol))
  }

  toArray(): T[] {
    return [...this._items.values()]
  }

  [Symbol.iterator](): Iterator<T> {
    return this._items.values()
  }
}
