/**
 * @file 时间线屏幕
 *
 * 无限滚动的帖子列表：滚动露出空行时拉取更早的帖子补上。
 */

import type { Status, Timeline } from "@slowterm/client";
import { type Action, type NavigationStack, NULL_ACTION, swapAction } from "@slowterm/tui";
import { expandSpoilers, type SessionContext } from "../context.js";
import { ComposerScreen } from "./composer.js";
import { HelpScreen } from "./help.js";
import { LoginScreen } from "./login.js";
import { PostBlock } from "./post-block.js";
import { HELP_STATUS, ordinalKey, PostListScreen } from "./post-list.js";
import { openThread } from "./thread.js";

export class TimelineScreen extends PostListScreen {
	readonly timeline: Timeline;
	private loaded = false;

	constructor(nav: NavigationStack, ctx: SessionContext, timeline: Timeline, top = 2) {
		super(nav, ctx, top);
		this.timeline = timeline;
	}

	get isLoaded(): boolean {
		return this.loaded;
	}

	private blocksFor(statuses: readonly Status[]): PostBlock[] {
		return statuses.map((status) => this.toBlock(status));
	}

	private toBlock(status: Status): PostBlock {
		return new PostBlock(status, {
			columns: this.nav.columns,
			showSpoiler: expandSpoilers(this.ctx),
			timeZone: this.ctx.timeZone,
		});
	}

	/** 首次显示前拉取第一页 */
	async load(): Promise<void> {
		this.nav.status("Fetching timeline...");
		const statuses = await this.ctx.client.fetchTimeline(this.timeline, { limit: this.ctx.timelineLimit });
		this.viewport.setBlocks(this.blocksFor(statuses));
		this.exhausted = false;
		this.loaded = true;
	}

	protected async fetchMore(): Promise<PostBlock[]> {
		const { nav, ctx } = this;
		const blocks = this.viewport.blocks;
		const last = blocks[blocks.length - 1];
		nav.status("Fetching more posts...");
		const statuses = await ctx.client.fetchTimeline(this.timeline, {
			limit: ctx.timelineLimit,
			since: last?.status,
		});
		nav.status("Additional posts fetched, drawing...");
		const fetched = this.blocksFor(statuses);
		nav.status(HELP_STATUS);
		return fetched;
	}

	draw(): void {
		this.viewport.fullRepaint();
		if (this.ctx.lastPost) {
			this.ctx.lastPost = undefined;
			this.nav.status(`New status posted! ${HELP_STATUS}`);
		} else {
			this.nav.status(HELP_STATUS);
		}
	}

	private async refresh(): Promise<Action> {
		const { nav, ctx } = this;
		nav.status("Refetching timeline...");
		const statuses = await ctx.client.fetchTimeline(this.timeline, { limit: ctx.timelineLimit });
		nav.status("Timeline fetched, drawing...");
		this.exhausted = false;
		await this.settle(this.viewport.refresh(this.blocksFor(statuses)));
		nav.status(HELP_STATUS);
		return NULL_ACTION;
	}

	async handleInput(data: string): Promise<Action | undefined> {
		const { nav, ctx } = this;
		const action = ctx.keybindings.actionFor(data);
		const scrolled = await this.scroll(action);
		if (scrolled) return scrolled;

		switch (action) {
			case "refresh":
				return this.refresh();
			case "compose": {
				const composer = new ComposerScreen(nav, ctx);
				return swapAction((stack) => stack.push([composer]));
			}
			case "help": {
				const help = new HelpScreen(nav, ctx.keybindings);
				return swapAction((stack) => stack.push([help]));
			}
			case "quit": {
				ctx.client.logout();
				ctx.account = undefined;
				ctx.prefs = undefined;
				ctx.password = undefined;
				const login = new LoginScreen(nav, ctx);
				return swapAction((stack) => stack.replace([login]));
			}
			default:
				break;
		}

		const ordinal = ordinalKey(data);
		if (!ordinal) return undefined;
		if (ordinal.kind === "spoiler") {
			return this.toggleSpoiler(ordinal.ordinal);
		}
		const found = this.blockAt(ordinal.ordinal);
		if (!found) return NULL_ACTION;
		return openThread(nav, ctx, found.block.post.id);
	}
}
