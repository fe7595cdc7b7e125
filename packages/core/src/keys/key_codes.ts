/** Control bytes the decoder recognizes in the Normal state. */
export const CTRL_A = '\u0001'
export const CTRL_B = '\u0002'
export const CTRL_C = '\u0003'
export const CTRL_D = '\u0004'
export const CTRL_E = '\u0005'
export const CTRL_F = '\u0006'
export const CTRL_H = '\u0008'
export const TAB = '\t'
export const CTRL_K = '\u000b'
export const CTRL_L = '\u000c'
export const ENTER = '\r'
export const CTRL_N = '\u000e'
export const CTRL_P = '\u0010'
export const CTRL_T = '\u0014'
export const CTRL_U = '\u0015'
export const CTRL_W = '\u0017'
export const ESC = '\u001b'
export const BACKSPACE = '\u007f'
export const HELP = '?'
