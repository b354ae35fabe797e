/**
 * @file 时间线标签栏
 *
 * 第一行的 [H]ome [L]ocal [G]lobal 标签。每个时间线在第一次切换到它时才创建并拉取，
 * 之后保留滚动位置。
 */

import type { Timeline } from "@slowterm/client";
import {
	type Action,
	highlight,
	type NavigationStack,
	NULL_ACTION,
	padLine,
	rectAt,
	type Screen,
	swapAction,
	type TimelineAction,
} from "@slowterm/tui";
import type { SessionContext } from "../context.js";
import { TimelineScreen } from "./timeline.js";

const TABS: ReadonlyArray<{ timeline: Timeline; label: string; action: TimelineAction }> = [
	{ timeline: "home", label: "[H]ome", action: "homeTimeline" },
	{ timeline: "local", label: "[L]ocal", action: "localTimeline" },
	{ timeline: "public", label: "[G]lobal", action: "globalTimeline" },
];

export class TimelineTabs implements Screen {
	private readonly nav: NavigationStack;
	private readonly ctx: SessionContext;
	private readonly timelines = new Map<Timeline, TimelineScreen>();
	private selected: Timeline = "home";

	constructor(nav: NavigationStack, ctx: SessionContext) {
		this.nav = nav;
		this.ctx = ctx;
	}

	get current(): Timeline {
		return this.selected;
	}

	/** 选中某个时间线，必要时创建并拉取第一页 */
	async open(timeline: Timeline): Promise<TimelineScreen> {
		let screen = this.timelines.get(timeline);
		if (!screen) {
			screen = new TimelineScreen(this.nav, this.ctx, timeline);
			this.timelines.set(timeline, screen);
		}
		if (!screen.isLoaded) {
			await screen.load();
		}
		this.selected = timeline;
		return screen;
	}

	draw(): void {
		const markup = TABS.map((tab) =>
			tab.timeline === this.selected ? `<b><r> ${tab.label} </r></b> ` : `<r> ${tab.label} </r> `,
		).join("");
		const { painter, columns } = this.nav;
		painter.paint([padLine(highlight(markup), columns)], rectAt(1, 1, 1, columns));
	}

	async handleInput(data: string): Promise<Action | undefined> {
		const tab = TABS.find((candidate) => this.ctx.keybindings.matches(data, candidate.action));
		if (!tab) return undefined;
		if (tab.timeline === this.selected) return NULL_ACTION;

		const screen = await this.open(tab.timeline);
		return swapAction((stack) => stack.replace([this, screen]));
	}
}
