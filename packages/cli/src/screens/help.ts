/**
 * @file 帮助屏幕
 *
 * 帮助文本用帖子同样的受限 HTML 书写，按当前快捷键配置生成。
 */

import {
	type Action,
	BACK_ACTION,
	boxBottom,
	boxMiddle,
	boxTop,
	htmlToStyled,
	joinLines,
	type KeyId,
	type NavigationStack,
	rectAt,
	type Screen,
	sanitize,
	type StyledLine,
	styledLine,
	type TimelineAction,
	type TimelineKeybindingsManager,
	wordWrap,
} from "@slowterm/tui";

const KEY_NAMES: Readonly<Record<string, string>> = {
	up: "up arrow",
	down: "down arrow",
	left: "left arrow",
	right: "right arrow",
	enter: "return",
	return: "return",
	tab: "tab",
	escape: "escape",
	backspace: "backspace",
	delete: "delete",
};

function keyName(key: KeyId): string {
	return KEY_NAMES[key] ?? `'${key}'`;
}

/** 某个动作的按键说明，如 <b>'n'</b> */
function keysFor(bindings: TimelineKeybindingsManager, action: TimelineAction): string {
	return bindings
		.getKeys(action)
		.map((key) => `<b>${sanitize(keyName(key))}</b>`)
		.join(" or ");
}

/** 生成帮助 HTML */
export function helpHtml(bindings: TimelineKeybindingsManager): string {
	const k = (action: TimelineAction): string => keysFor(bindings, action);
	return [
		"<p><u>Reading</u></p>",
		`<p>Use ${k("scrollUp")} and ${k("scrollDown")} to scroll the timeline one line at a time. `,
		`Press ${k("nextPost")} to jump to the next post, ${k("previousPost")} for the previous one `,
		`and ${k("top")} to go back to the top.</p>`,
		`<p>Each visible post shows a number. Press that number to open the post's thread, `,
		"or the number with <b>shift</b> to show or hide a content warning.</p>",
		"<p><u>Timelines</u></p>",
		`<p>${k("homeTimeline")} home, ${k("localTimeline")} local and ${k("globalTimeline")} global. `,
		`${k("refresh")} fetches the timeline again.</p>`,
		"<p><u>Posting</u></p>",
		`<p>${k("compose")} writes a new post. In a thread, <b>'f'</b> likes, <b>'o'</b> boosts, `,
		"<b>'s'</b> bookmarks and <b>'c'</b> replies to the highlighted post; <b>'b'</b> goes back.</p>",
		`<p>${k("quit")} logs out. Press <b>'b'</b> to leave this help.</p>`,
	].join("");
}

export class HelpScreen implements Screen {
	private readonly nav: NavigationStack;
	readonly lines: StyledLine[];

	constructor(nav: NavigationStack, bindings: TimelineKeybindingsManager) {
		this.nav = nav;
		const width = nav.columns;
		const text = htmlToStyled(helpHtml(bindings));
		const body = wordWrap(text.text, text.attrs, width - 4).map((line) =>
			boxMiddle(joinLines(" ", styledLine(line.text, line.meta)), width),
		);
		this.lines = [boxTop(width), ...body, boxBottom(width)].slice(0, nav.rows);
	}

	draw(): void {
		const { painter, rows, columns } = this.nav;
		painter.clearRows(1, rows);
		painter.paint(this.lines, rectAt(1, 1, this.lines.length, columns));
		this.nav.status("Press 'b' to go back.");
	}

	handleInput(data: string): Action | undefined {
		if (data === "b") {
			return BACK_ACTION;
		}
		return undefined;
	}
}
