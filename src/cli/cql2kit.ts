/// <reference types="node" />
/**
 * cql2kit CLI
 *
 * CQL2 のフィルタ式（テキスト / JSON）を受け取り、別の表現へ変換して出力する。
 * 入力は --text／--json／--file／STDIN のいずれか。
 *
 * 使い方:
 *   cql2kit --text 'cloud_cover < 20 AND platform = "sentinel-2a"' --to json --pretty
 *   echo '{"op":"=","args":[{"property":"id"},1]}' | cql2kit --to sql --table items
 *   cql2kit repl
 *
 * オプション:
 *   --text "<cql2-text>"        テキスト形式の式
 *   --json '<cql2-json>'        JSON 形式の式
 *   --file <path>               式を含むファイル（形式は --from か内容から判定）
 *   --from text|json            入力形式（既定: 内容から判定）
 *   --to text|json|ast|sql|odata|flatten  出力形式（既定: json）
 *   --table <name>              sql 出力のテーブル名（既定: items）
 *   --pretty                    JSON を整形して出力
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { Cql2Error } from '../errors/errors.ts';
import type { InputFormat, OutputFormat } from './convert.ts';
import { INPUT_FORMATS, OUTPUT_FORMATS, convert, isInputFormat, isOutputFormat } from './convert.ts';

type Args = {
  cmd?: 'run' | 'repl';
  text?: string;
  json?: string;
  file?: string;
  from?: InputFormat;
  to?: OutputFormat;
  table?: string;
  pretty?: boolean;
};

function printHelp(): void {
  console.log(`cql2kit CLI

Usage:
  cql2kit --text 'cloud_cover < 20' --to json --pretty
  echo '{"op":"=","args":[{"property":"id"},1]}' | cql2kit --to sql
  cql2kit repl

Options:
  --text "<cql2-text>"     Inline CQL2-Text expression
  --json '<cql2-json>'     Inline CQL2-JSON expression
  --file <path>            File containing an expression
  --from ${INPUT_FORMATS.join('|')}         Input format (default: detect)
  --to ${OUTPUT_FORMATS.join('|')}
                           Output format (default: json)
  --table <name>           Table name for sql output (default: items)
  --pretty                 Pretty-print JSON output
`);
}

function exitWithUsage(message: string): never {
  console.error(`Error: ${message}`);
  printHelp();
  process.exit(1);
}

function nextValueOrExit(argv: string[], idxRef: { i: number }, flag: string): string {
  idxRef.i++;
  const v = argv[idxRef.i];
  if (typeof v === 'string' && v.length > 0 && !v.startsWith('--')) return v;
  return exitWithUsage(`${flag} requires a value`);
}

function parseArgs(argv: string[]): Args {
  const args: Args = {};
  const ref = { i: 1 };
  // サブコマンド風に "repl" を認識
  if (argv[2] === 'repl') {
    args.cmd = 'repl';
    return args;
  }
  while (++ref.i < argv.length) {
    const a = argv[ref.i];
    if (a === '--text') args.text = nextValueOrExit(argv, ref, '--text');
    else if (a === '--json') args.json = nextValueOrExit(argv, ref, '--json');
    else if (a === '--file') args.file = nextValueOrExit(argv, ref, '--file');
    else if (a === '--table') args.table = nextValueOrExit(argv, ref, '--table');
    else if (a === '--from') {
      const v = nextValueOrExit(argv, ref, '--from');
      args.from = isInputFormat(v) ? v : exitWithUsage(`--from must be one of ${INPUT_FORMATS.join(' | ')} (got "${v}")`);
    } else if (a === '--to') {
      const v = nextValueOrExit(argv, ref, '--to');
      args.to = isOutputFormat(v) ? v : exitWithUsage(`--to must be one of ${OUTPUT_FORMATS.join(' | ')} (got "${v}")`);
    } else if (a === '--pretty') args.pretty = true;
    else if (a === '--help' || a === '-h') {
      printHelp();
      process.exit(0);
    } else {
      exitWithUsage(`Unknown option: ${a}`);
    }
  }
  return args;
}

async function readStdin(): Promise<string> {
  let buf = '';
  process.stdin.setEncoding('utf8');
  for await (const chunk of process.stdin) buf += String(chunk);
  return buf.trim();
}

async function readSource(args: Args): Promise<{ source: string; from?: InputFormat }> {
  if (args.text !== undefined) return { source: args.text, from: 'text' };
  if (args.json !== undefined) return { source: args.json, from: 'json' };
  if (args.file) return { source: await fs.readFile(path.resolve(args.file), 'utf8'), from: args.from };
  if (!process.stdin.isTTY) return { source: await readStdin(), from: args.from };
  return exitWithUsage('--text, --json, --file or STDIN is required');
}

async function runOnce(args: Args): Promise<void> {
  const { source, from } = await readSource(args);
  const out = convert(source, { from, to: args.to ?? 'json', pretty: args.pretty, table: args.table });
  console.log(out);
}

async function main() {
  const args = parseArgs(process.argv);
  if (args.cmd === 'repl') {
    const { startRepl } = await import('./repl.ts');
    await startRepl();
    return;
  }
  await runOnce(args);
}

main().catch((err: unknown) => {
  // 入力由来のエラーはコードとメッセージだけ、それ以外はスタックごと出す
  if (err instanceof Cql2Error) console.error(`cql2kit error [${err.code}]: ${err.message}`);
  else console.error('cql2kit error:', err);
  process.exit(1);
});
