/**
 * @file 导航动作
 *
 * 屏幕和控件处理输入后返回的动作，由导航栈和会话循环执行。
 */

import type { NavigationStack } from "./navigation.js";

/** 输入已被处理，无需其他动作 */
export interface NullAction {
	readonly type: "null";
}

/** 结束会话 */
export interface ExitAction {
	readonly type: "exit";
}

/** 返回上一组屏幕 */
export interface BackAction {
	readonly type: "back";
	/** 返回的层数（默认 1） */
	readonly depth?: number;
}

/** 替换或压入屏幕组，swap 负责具体操作 */
export interface SwapAction {
	readonly type: "swap";
	swap(nav: NavigationStack): void;
}

export type Action = NullAction | ExitAction | BackAction | SwapAction;

export const NULL_ACTION: NullAction = Object.freeze({ type: "null" });
export const EXIT_ACTION: ExitAction = Object.freeze({ type: "exit" });
export const BACK_ACTION: BackAction = Object.freeze({ type: "back" });

export function swapAction(swap: (nav: NavigationStack) => void): SwapAction {
	return { type: "swap", swap };
}

/** 伪输入：控件获得焦点 */
export const FOCUS_INPUT = "\x80";
/** 伪输入：控件失去焦点 */
export const UNFOCUS_INPUT = "\x81";
