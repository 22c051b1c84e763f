export { BLANK_SAMPLE, buildConfiguration } from './finalize'
export {
  DEFAULT_REPLICATES,
  buildFromTemplate,
  buildPerGroupConfiguration,
  buildUniformConfiguration,
  type TemplateDeclaration,
  type TemplateOptions,
} from './template'
export { parseLayoutText, type LayoutParseOptions, type LayoutParseResult } from './layoutText'
export { LayoutJsonSchema, parseLayoutJson, parseLayoutJsonText, type LayoutJson } from './layoutJson'
export { buildFromFile } from './buildFromFile'
export { sanitize } from '@/utils/sanitize'
export { wellRange } from '@/utils/wells'
