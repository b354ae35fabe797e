/**
 * @file 字符终端渲染库入口文件
 *
 * 本文件是渲染包的公共 API 入口点，从各个模块中重新导出公共接口、类型和类。
 *
 * 主要导出内容：
 * - 带属性文本模型和矩形裁剪
 * - 自动换行和文本处理工具
 * - 增量绘制（Painter）和滚动视口（BlockViewport）
 * - 导航栈、动作和表单控件
 * - VT-100 终端实现和按键识别
 */

// 导航动作
export {
	type Action,
	BACK_ACTION,
	type BackAction,
	EXIT_ACTION,
	type ExitAction,
	FOCUS_INPUT,
	NULL_ACTION,
	type NullAction,
	type SwapAction,
	swapAction,
	UNFOCUS_INPUT,
} from "./actions.js";
// 字符属性
export { type Attrs, applyCommands, attrsEqual, codesFrom, makeAttrs, NORMAL } from "./attrs.js";
// 表单控件
export { account, boost, boxBottom, boxMiddle, boxTop } from "./components/box.js";
export { Button, type ButtonOptions } from "./components/button.js";
export { type Control, FocusRing } from "./components/focus.js";
export { OneLineInput, type OneLineInputOptions } from "./components/input.js";
export { MultiLineInput } from "./components/multiline-input.js";
export { HorizontalSelect, type HorizontalSelectOptions } from "./components/select.js";
// 快捷键绑定
export {
	DEFAULT_TIMELINE_KEYBINDINGS,
	TIMELINE_ACTIONS,
	type TimelineAction,
	type TimelineKeybindingsConfig,
	TimelineKeybindingsManager,
} from "./keybindings.js";
// 按键识别
export { isPrintable, type KeyId, matchesKey, type NamedKey, parseKey } from "./keys.js";
// 标记与 HTML
export { highlight, htmlToStyled, sanitize, unsanitize } from "./markup.js";
// 导航栈
export { NavigationStack, type Screen } from "./navigation.js";
// 绘制
export { type DeviceState, Painter } from "./painter.js";
export { BoundingRectangle, type RectBounds, rectAt } from "./rect.js";
export {
	blankLine,
	joinLines,
	padLine,
	plain,
	replaceAt,
	type StyledLine,
	sliceLine,
	styledLine,
} from "./styled-text.js";
// 终端
export { InputBuffer, type InputBufferEventMap, type InputBufferOptions } from "./input-buffer.js";
export {
	CLEAR_SCROLL_REGION,
	COMMAND_CODES,
	encodeMove,
	encodeScrollRegion,
	type Terminal,
	type TerminalCommand,
	TerminalDisconnectedError,
	Vt100Terminal,
	type Vt100TerminalOptions,
} from "./terminal.js";
// 文本处理工具
export {
	center,
	isBreakPunctuation,
	isWhitespaceChar,
	lpad,
	obfuscate,
	pad,
	spoiler,
	stripLow,
	toDisplayable,
	type WrapOptions,
	type WrappedLine,
	wordWrap,
} from "./utils.js";
// 滚动视口
export {
	BlockViewport,
	type ContentBlock,
	MAX_OFFSET,
	ordinalLabel,
	type ScrollResult,
	type ViewportOptions,
} from "./viewport.js";
