import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import type { Configuration } from '@/types'
import { IOError } from '@/utils/errors'
import { parseLayoutJsonText } from './layoutJson'
import { parseLayoutText, type LayoutParseOptions } from './layoutText'

/**
 * Reads a layout file. `.json` files use the JSON layout format, anything
 * else the tab-delimited one (strict unless told otherwise).
 */
export async function buildFromFile(path: string, options: LayoutParseOptions = {}): Promise<Configuration> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (err) {
    throw new IOError(`Unable to read layout file: ${path}`, { cause: err })
  }
  if (extname(path).toLowerCase() === '.json') return parseLayoutJsonText(text)
  return parseLayoutText(text, { strict: options.strict ?? true }).configuration
}
