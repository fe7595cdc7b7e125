/**
 * Line editing over arbitrary duplex byte streams: key decoding, edit
 * primitives, in-memory history and VT100 redraw of wrapped prompt lines.
 */
export { LineEditor, type LineEditorOptions, type ReadLineResult } from './editor/line_editor'
export {
    NO_COMPLETION,
    NO_HELP,
    NO_HINT,
    completionFrom,
    helpFrom,
    hintFrom,
    type CompletionCapability,
    type HelpCapability,
    type HelpEntry,
    type Hint,
    type HintCapability,
} from './capabilities'
export { HistoryStore, type HistoryMove, type HistoryStoreOptions } from './history/history_store'
export { decodeKey, type KeyCommand, type RuneSource } from './keys/key_decoder'
export { EMPTY_LINE, lineText, type EditStep, type LineState } from './edit/line_state'
export { DEFAULT_GEOMETRY, normalizeGeometry, renderLine, type Geometry, type RenderPlan } from './render/renderer'
export { defaultRuneWidth, promptWidth, wideRuneWidth, type RuneWidth } from './render/visual_width'
export { alignColumns, chunk, type ColumnLayout } from './render/columns'
export { COLOR_NAMES, styleText, type ColorName, type TextStyle } from './render/styles'
export { parseCursorReport, type CursorReport } from './io/cursor_report'
export { LineEditorError, errorMessage, isLineEditorError, type LineEditorErrorCode } from './errors'
export { createEnvLogger, createLogger, isLogLevel, type LogLevel, type Logger } from './logger'
export {
    DEFAULT_CONFIG,
    loadVtlineConfig,
    parseVtlineConfig,
    resolveVtlineHome,
    type LoadedConfig,
    type VtlineConfig,
} from './config/config'
