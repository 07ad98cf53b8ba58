/**
 * 核心工具函数模块
 */

// 文本格式中表示ε的写法
export const EPSILON_SPELLINGS = ['ε', 'eps']

// 注释起始符
export const COMMENT_MARK = '#'

export class ToolkitError extends Error {}

/**
 * 断言函数，如果条件为假则抛出错误
 */
export function requireCondition(condition: unknown, message: string): asserts condition {
  if (!condition) throw new ToolkitError(message)
}

/**
 * 直接输出到标准输出
 */
export function writeToStdout(content: string): void {
  process.stdout.write(content)
}

/**
 * 去掉行内注释
 */
export function stripComment(line: string): string {
  const index = line.indexOf(COMMENT_MARK)
  return index === -1 ? line : line.slice(0, index)
}

/**
 * 按空白切分，丢弃空串
 */
export function splitWords(str: string): string[] {
  return str.split(/\s+/).filter(word => word.length > 0)
}

/**
 * 返回一个不在已用名字中的新名字，冲突时不断追加撇号
 */
export function freshName(base: string, used: Iterable<string>): string {
  const taken = new Set(used)
  let name = base
  while (taken.has(name)) name += "'"
  return name
}
