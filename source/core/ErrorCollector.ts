/**
 * 错误收集和报告模块
 */

import { ToolkitError } from './utils'

/**
 * 错误类型
 */
export enum ErrorType {
  UndefinedSymbol = '未定义符号',
  MalformedEpsilonUsage = 'ε用法错误',
  NoStartSymbol = '缺少开始符号',
  AmbiguousAcceptance = '接受方式不明确',
  MalformedInput = '输入格式错误',
}

/**
 * 带错误类型和出错对象的错误类
 */
export class DetailedGrammarError extends ToolkitError {
  public readonly errorType: ErrorType
  public readonly subject: string // 出错的符号或转移
  public readonly lineNumber: number

  constructor(errorType: ErrorType, message: string, subject: string = '', lineNumber: number = 0) {
    super(message)
    this.errorType = errorType
    this.subject = subject
    this.lineNumber = lineNumber
    this.name = 'DetailedGrammarError'
  }
}

/**
 * 错误收集器类
 */
export class ErrorCollector {
  private _errors: DetailedGrammarError[] = []

  /**
   * 添加错误
   */
  addError(error: DetailedGrammarError): void {
    this._errors.push(error)
  }

  addUndefinedSymbol(message: string, subject: string, lineNumber: number = 0): void {
    this.addError(new DetailedGrammarError(ErrorType.UndefinedSymbol, message, subject, lineNumber))
  }

  addMalformedEpsilon(message: string, subject: string, lineNumber: number = 0): void {
    this.addError(new DetailedGrammarError(ErrorType.MalformedEpsilonUsage, message, subject, lineNumber))
  }

  addNoStartSymbol(message: string, subject: string = ''): void {
    this.addError(new DetailedGrammarError(ErrorType.NoStartSymbol, message, subject))
  }

  addMalformedInput(message: string, subject: string, lineNumber: number = 0): void {
    this.addError(new DetailedGrammarError(ErrorType.MalformedInput, message, subject, lineNumber))
  }

  /**
   * 合并另一个收集器中的错误
   */
  absorb(other: ErrorCollector): void {
    this._errors.push(...other._errors)
  }

  /**
   * 检查是否有错误
   */
  hasErrors(): boolean {
    return this._errors.length > 0
  }

  /**
   * 获取所有错误
   */
  getErrors(): DetailedGrammarError[] {
    return [...this._errors]
  }

  getErrorCount(): number {
    return this._errors.length
  }

  /**
   * 有错误时抛出第一个错误，其余错误仍可通过getErrors取得
   */
  throwIfErrors(): void {
    if (this._errors.length > 0) throw this._errors[0]
  }

  /**
   * 报告所有错误
   */
  reportErrors(): void {
    if (this._errors.length === 0) {
      return
    }

    console.error(`\n[错误] 共发现 ${this._errors.length} 个错误：\n`)

    // 按行号排序，无行号的错误排在最后
    const sortedErrors = [...this._errors].sort((a, b) => {
      const lineA = a.lineNumber > 0 ? a.lineNumber : Number.MAX_SAFE_INTEGER
      const lineB = b.lineNumber > 0 ? b.lineNumber : Number.MAX_SAFE_INTEGER
      return lineA - lineB
    })

    for (const error of sortedErrors) {
      const location = error.lineNumber > 0 ? `（行${error.lineNumber}）` : ''
      console.error(`[${error.errorType}] ${error.message}${location}`)
    }

    console.error('')
  }

  clear(): void {
    this._errors = []
  }
}

/**
 * 收集器中的错误在抛出时附带收集器本身，便于上层报告全部错误
 */
export class CollectedErrors extends ToolkitError {
  public readonly collector: ErrorCollector

  constructor(collector: ErrorCollector) {
    super(collector.getErrors().map(error => error.message).join('\n'))
    this.collector = collector
    this.name = 'CollectedErrors'
  }
}
