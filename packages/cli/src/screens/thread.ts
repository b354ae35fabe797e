/**
 * @file 讨论串屏幕
 *
 * 显示上文、当前帖子和所有回复，回复按层级缩进并画出连线。
 * 互动操作（f 喜欢、o 转发、s 收藏、c 回复）都作用于当前帖子；b 返回。
 */

import { flattenThread, type Status, type Thread } from "@slowterm/client";
import { type Action, BACK_ACTION, type NavigationStack, NULL_ACTION, swapAction } from "@slowterm/tui";
import { expandSpoilers, type SessionContext } from "../context.js";
import { ComposerScreen } from "./composer.js";
import { PostBlock } from "./post-block.js";
import { HELP_STATUS, ordinalKey, PostListScreen } from "./post-list.js";

const THREAD_STATUS = "Press 'b' to go back.";

/** 拉取帖子所在的讨论串并打开 */
export async function openThread(nav: NavigationStack, ctx: SessionContext, id: string): Promise<Action> {
	const previous = nav.status("Fetching thread...");
	const thread = await ctx.client.fetchPostAndRelated(id);
	nav.status(previous);
	const screen = new ThreadScreen(nav, ctx, thread);
	return swapAction((stack) => stack.push([screen]));
}

export class ThreadScreen extends PostListScreen {
	readonly thread: Thread;
	/** 当前帖子的块下标 */
	private readonly focusIndex: number;

	constructor(nav: NavigationStack, ctx: SessionContext, thread: Thread) {
		super(nav, ctx, 1);
		this.thread = thread;
		this.exhausted = true;

		const showSpoiler = expandSpoilers(ctx);
		const entries = flattenThread(thread);
		this.focusIndex = entries.findIndex((entry) => entry.index === thread.focus);
		this.viewport.setBlocks(
			entries.map(
				(entry) =>
					new PostBlock(entry.status, {
						columns: nav.columns,
						info: entry.info,
						showSpoiler,
						timeZone: ctx.timeZone,
					}),
			),
		);
	}

	protected async fetchMore(): Promise<PostBlock[]> {
		return [];
	}

	get focused(): PostBlock {
		return this.viewport.blocks[this.focusIndex];
	}

	draw(): void {
		this.viewport.fullRepaint();
		this.nav.status(THREAD_STATUS);
	}

	/** 执行一个互动操作并用返回的帖子重画当前块 */
	private async interact(
		label: string,
		active: boolean | undefined,
		on: (id: string) => Promise<Status>,
		off: (id: string) => Promise<Status>,
	): Promise<Action> {
		const block = this.focused;
		this.nav.status(`${label}...`);
		const updated = await (active ? off(block.post.id) : on(block.post.id));
		// Boosting answers with the boost wrapping the post.
		const fresh: Status = updated.reblog ?? updated;
		this.replaceStatus(this.focusIndex, block.with({ status: fresh }));
		this.nav.status(THREAD_STATUS);
		return NULL_ACTION;
	}

	async handleInput(data: string): Promise<Action | undefined> {
		const { ctx } = this;
		const scrolled = await this.scroll(ctx.keybindings.actionFor(data));
		if (scrolled) return scrolled;

		const ordinal = ordinalKey(data);
		if (ordinal?.kind === "spoiler") {
			return this.toggleSpoiler(ordinal.ordinal);
		}
		if (ordinal?.kind === "open") {
			const found = this.blockAt(ordinal.ordinal);
			if (!found || found.index === this.focusIndex) return NULL_ACTION;
			return openThread(this.nav, ctx, found.block.post.id);
		}

		const { client } = ctx;
		const post = this.focused.post;
		switch (data) {
			case "b":
				this.nav.status(HELP_STATUS);
				return BACK_ACTION;
			case "f":
				return this.interact(
					post.favourited ? "Unliking" : "Liking",
					post.favourited,
					(id) => client.favourite(id),
					(id) => client.unfavourite(id),
				);
			case "o":
				return this.interact(
					post.reblogged ? "Unboosting" : "Boosting",
					post.reblogged,
					(id) => client.boost(id),
					(id) => client.unboost(id),
				);
			case "s":
				return this.interact(
					post.bookmarked ? "Removing bookmark" : "Bookmarking",
					post.bookmarked,
					(id) => client.bookmark(id),
					(id) => client.unbookmark(id),
				);
			case "c": {
				const composer = new ComposerScreen(this.nav, ctx, { replyTo: post });
				return swapAction((stack) => stack.push([composer]));
			}
			default:
				return undefined;
		}
	}
}
