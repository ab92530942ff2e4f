/**
 * cql2kit REPL (簡易)
 *
 * 1行の CQL2 式（テキストまたは JSON）を入力し、現在の出力形式で即時表示する。:q で終了。
 * 出力形式の初期値は環境変数 CQL2KIT_FORMAT（未設定なら json）。
 *
 * コマンド:
 *   :q             終了
 *   :to <format>   出力形式を変更（text|json|ast|sql|odata|flatten）
 *   :pretty on|off JSON の整形を切替
 */

import process from 'node:process';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { Cql2Error } from '../errors/errors.ts';
import type { OutputFormat } from './convert.ts';
import { OUTPUT_FORMATS, convert, isOutputFormat } from './convert.ts';

function initialFormat(): OutputFormat {
  const env = process.env.CQL2KIT_FORMAT;
  if (env === undefined || env === '') return 'json';
  if (isOutputFormat(env)) return env;
  console.error(`REPL warning: CQL2KIT_FORMAT="${env}" is not one of ${OUTPUT_FORMATS.join('|')}; using json`);
  return 'json';
}

export async function startRepl(): Promise<void> {
  let to = initialFormat();
  let pretty = false;

  const rl = readline.createInterface({ input, output, prompt: 'cql2> ' });
  rl.prompt();

  for await (const line of rl) {
    const text = line.trim();
    if (text === '') { rl.prompt(); continue; }
    if (text === ':q') { break; }

    // 設定コマンド
    if (text.startsWith(':to ')) {
      const v = text.slice(4).trim();
      if (isOutputFormat(v)) {
        to = v;
        console.log(`to = ${to}`);
      } else {
        console.log(`usage: :to ${OUTPUT_FORMATS.join('|')}`);
      }
      rl.prompt();
      continue;
    }
    if (text.startsWith(':pretty ')) {
      const v = text.slice(8).trim();
      if (v === 'on') pretty = true;
      else if (v === 'off') pretty = false;
      else console.log('usage: :pretty on|off');
      console.log(`pretty = ${pretty}`);
      rl.prompt();
      continue;
    }

    try {
      console.log(convert(text, { to, pretty }));
    } catch (err) {
      if (!(err instanceof Cql2Error)) throw err;
      console.error(`REPL error [${err.code}]: ${err.message}`);
    }

    rl.prompt();
  }

  rl.close();
}
