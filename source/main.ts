#!/usr/bin/env node
/**
 * cfg-toolkit 命令行入口
 * 用法:
 *   node main.js normalize <grammar.cfg> [options]
 *   node main.js convert <automaton.pda> [options]
 * 选项:
 *   -o <output_path>        输出到文件（带声明，可再次读入）
 *   -v                      显示处理过程详细信息
 *   --no-start-epsilon      规范化时不保留 start -> ε
 *   --acceptance <mode>     接受方式：empty-stack / empty-stack-in-accepting-state / final-state
 *   --start-name <name>     转换时新开始符号的名字
 *   --normalize             转换后再规范化
 */

import * as fs from 'fs'
import * as path from 'path'
import minimist from 'minimist'
import { CollectedErrors } from './core/ErrorCollector'
import { Grammar } from './core/grammar/Grammar'
import { ToolkitError, requireCondition, writeToStdout } from './core/utils'
import { ACCEPTANCE_MODES, AcceptanceMode, parseAcceptanceMode } from './core/automata/AutomatonTypes'
import { normalizeWithStages, NormalizationOptions } from './normalizer/NormalizationPipeline'
import { convert } from './converter/PdaToCfgConverter'
import { loadGrammarFile } from './io/GrammarFileParser'
import { loadAutomatonFile } from './io/AutomatonFileParser'
import { formatGrammar, formatProductions } from './io/GrammarPrinter'

const USAGE = '[用法]: cfg-toolkit <normalize|convert> <path> [-o <output_path>] [-v] [--acceptance <mode>] [--normalize]'

type Printer = (message: string) => void

function normalizeVerbosely(grammar: Grammar, options: NormalizationOptions, print: Printer): Grammar {
  let result = grammar
  for (const { stage, grammar: staged } of normalizeWithStages(grammar, options)) {
    print(`  阶段 ${stage} 完成，共 ${staged.productions.length} 个产生式：`)
    formatProductions(staged).forEach(line => print(`    ${line}`))
    result = staged
  }
  return result
}

/**
 * 执行一条命令
 * @returns 需要写到标准输出的内容；指定 -o 时写入文件并返回空串
 */
export function runCommand(argv: string[], print: Printer = () => undefined): string {
  const args = minimist(argv, {
    string: ['o', 'acceptance', 'start-name'],
    boolean: ['v', 'normalize', 'start-epsilon'],
    default: { 'start-epsilon': true },
  })

  requireCondition(args._.length === 2, USAGE)
  const [command, inputPath] = args._.map(String)
  const normalizationOptions: NormalizationOptions = { keepStartEpsilon: Boolean(args['start-epsilon']) }

  print('*** 基本信息 ***')
  print(`  命令: ${command}`)
  print(`  输入文件: ${inputPath}`)
  requireCondition(fs.existsSync(inputPath), `找不到输入文件: ${inputPath}`)

  let result: Grammar
  switch (command) {
    case 'normalize': {
      print('  读取文法...')
      const grammar = loadGrammarFile(inputPath)
      print(`  文法读取完成，共 ${grammar.nonterminals.length} 个非终结符、${grammar.productions.length} 个产生式。`)
      result = normalizeVerbosely(grammar, normalizationOptions, print)
      break
    }
    case 'convert': {
      print('  读取下推自动机...')
      const { automaton, acceptance: declared } = loadAutomatonFile(inputPath)
      print(`  自动机读取完成，共 ${automaton.states.length} 个状态、${automaton.transitions.length} 条转移。`)

      let acceptance: AcceptanceMode | undefined = declared
      if (args.acceptance !== undefined) {
        const mode = parseAcceptanceMode(String(args.acceptance))
        requireCondition(mode !== null, `--acceptance 必须是 ${ACCEPTANCE_MODES.join(' / ')} 之一`)
        acceptance = mode
      }
      print(`  接受方式: ${acceptance ?? '(由唯一接受状态确定)'}`)

      const startName = args['start-name'] === undefined ? undefined : String(args['start-name'])
      result = convert(automaton, { acceptance, startName })
      print(`  转换完成，共 ${result.nonterminals.length} 个非终结符、${result.productions.length} 个产生式。`)
      if (args.normalize) {
        print('  开始规范化...')
        result = normalizeVerbosely(result, normalizationOptions, print)
      }
      break
    }
    default:
      throw new ToolkitError(USAGE)
  }

  if (args.o !== undefined) {
    const outputPath = String(args.o)
    const outputDir = path.dirname(outputPath)
    if (!fs.existsSync(outputDir)) {
      fs.mkdirSync(outputDir, { recursive: true })
    }
    fs.writeFileSync(outputPath, formatGrammar(result, { withDeclarations: true }))
    print(`  结果已写入: ${outputPath}`)
    return ''
  }
  return formatGrammar(result)
}

if (require.main === module) {
  const verbose = Boolean(minimist(process.argv.slice(2), { boolean: ['v'] }).v)
  const print: Printer = message => {
    if (verbose) console.log(message)
  }

  try {
    writeToStdout(runCommand(process.argv.slice(2), print))
  } catch (ex) {
    if (ex instanceof CollectedErrors) {
      ex.collector.reportErrors()
      process.exit(1)
    } else if (ex instanceof ToolkitError) {
      console.error(`[错误] ${ex.message}`)
      process.exit(1)
    } else {
      throw ex
    }
  }
}
