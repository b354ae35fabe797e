/**
 * @file 发帖屏幕
 *
 * 正文、内容警告、可见范围三个输入控件和发布/放弃两个按钮。
 * Tab 循环切换焦点；上下键在正文中移动光标，在其他控件上切换焦点。
 */

import type { StatusCore, Visibility } from "@slowterm/client";
import {
	account,
	type Action,
	BACK_ACTION,
	Button,
	FocusRing,
	HorizontalSelect,
	highlight,
	joinLines,
	matchesKey,
	MultiLineInput,
	type NavigationStack,
	NULL_ACTION,
	OneLineInput,
	rectAt,
	type Screen,
	sanitize,
	toDisplayable,
} from "@slowterm/tui";
import { defaultVisibility, type SessionContext } from "../context.js";
import { HELP_STATUS } from "./post-list.js";

/** 选择框中的可见范围文案，与 Visibility 一一对应 */
const VISIBILITY_CHOICES: ReadonlyArray<{ label: string; value: Visibility }> = [
	{ label: "public", value: "public" },
	{ label: "quiet public", value: "unlisted" },
	{ label: "followers", value: "private" },
	{ label: "specific accounts", value: "direct" },
];

const BODY_HEIGHT = 10;

export interface ComposerOptions {
	/** 回复的帖子 */
	replyTo?: StatusCore;
	/** 第一行 */
	top?: number;
}

export class ComposerScreen implements Screen {
	private readonly nav: NavigationStack;
	private readonly ctx: SessionContext;
	private readonly top: number;
	private readonly replyTo?: StatusCore;
	readonly body: MultiLineInput;
	readonly cw: OneLineInput;
	readonly visibility: HorizontalSelect;
	readonly postButton: Button;
	readonly discardButton: Button;
	private readonly ring: FocusRing;

	constructor(nav: NavigationStack, ctx: SessionContext, options: ComposerOptions = {}) {
		this.nav = nav;
		this.ctx = ctx;
		this.top = options.top ?? 1;
		this.replyTo = options.replyTo;

		const { painter, columns } = nav;
		const top = this.top;
		const mention = options.replyTo ? `@${options.replyTo.account.acct} ` : "";
		const selected = VISIBILITY_CHOICES.find((choice) => choice.value === defaultVisibility(ctx));

		this.body = new MultiLineInput(painter, mention, top + 2, 2, columns - 2, BODY_HEIGHT);
		this.cw = new OneLineInput(painter, options.replyTo?.spoiler_text ?? "", top + 13, 2, columns - 2);
		this.visibility = new HorizontalSelect(
			painter,
			VISIBILITY_CHOICES.map((choice) => choice.label),
			top + 14,
			19,
			25,
			{ selected: selected?.label },
		);
		this.postButton = new Button(painter, "Post", top + 17, 2);
		this.discardButton = new Button(painter, "Discard", top + 17, 9);
		this.ring = new FocusRing([this.body, this.cw, this.visibility, this.postButton, this.discardButton], 0);
	}

	private title(): string {
		return this.replyTo ? "Replying as " : "Posting as ";
	}

	draw(): void {
		const { painter, columns } = this.nav;
		const top = this.top;
		painter.clearRows(top, this.nav.rows);

		const me = this.ctx.account;
		const name = me ? account(me.display_name || me.username, me.acct, columns - 2 - this.title().length) : highlight("");
		painter.paint([joinLines(this.title(), name)], rectAt(top, 2, 1, columns - 2));
		if (this.replyTo) {
			const who = toDisplayable(this.replyTo.account.acct);
			painter.paint([highlight(`in reply to <b>@${sanitize(who)}</b>`)], rectAt(top + 1, 2, 1, columns - 2));
		}
		painter.paint([highlight("Content warning (optional):")], rectAt(top + 12, 2, 1, columns - 2));
		painter.paint([highlight("Post visibility:")], rectAt(top + 15, 2, 1, 16));

		this.body.draw();
		this.cw.draw();
		this.visibility.draw();
		this.postButton.draw();
		this.discardButton.draw();
		this.nav.status("Tab moves between fields.");
		this.ring.focus();
	}

	get selectedVisibility(): Visibility {
		const label = this.visibility.selected;
		return VISIBILITY_CHOICES.find((choice) => choice.label === label)?.value ?? "public";
	}

	private async post(): Promise<Action> {
		const text = this.body.text;
		if (!text.trim()) {
			this.nav.status("Cannot post an empty status!");
			this.ring.focus();
			return NULL_ACTION;
		}
		this.nav.status("Posting...");
		this.ctx.lastPost = await this.ctx.client.createPost(text, this.selectedVisibility, {
			cw: this.cw.text || undefined,
			inReplyTo: this.replyTo?.id,
		});
		this.nav.status(HELP_STATUS);
		return BACK_ACTION;
	}

	async handleInput(data: string): Promise<Action | undefined> {
		const { ring } = this;
		const current = ring.current;

		if (matchesKey(data, "tab")) {
			ring.next(true);
			return NULL_ACTION;
		}
		if (current !== this.body && matchesKey(data, "up")) {
			ring.previous();
			return NULL_ACTION;
		}
		if (current !== this.body && matchesKey(data, "down")) {
			ring.next();
			return NULL_ACTION;
		}
		if (matchesKey(data, "enter")) {
			if (current === this.postButton) {
				return this.post();
			}
			if (current === this.discardButton) {
				this.nav.status(HELP_STATUS);
				return BACK_ACTION;
			}
			if (current === this.cw || current === this.visibility) {
				ring.next();
				return NULL_ACTION;
			}
		}
		return ring.handleInput(data);
	}
}
