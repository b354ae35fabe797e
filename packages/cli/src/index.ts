export { type ParsedArgs, parseArgs, type SessionOptions } from "./args.js";
export {
	DEFAULT_TIMELINE_LIMIT,
	getConfigDir,
	getSettingsPath,
	keybindingsFrom,
	type LoadedSettings,
	loadSettings,
	type Settings,
	SettingsSchema,
} from "./config.js";
export { type ContextOptions, createContext, defaultVisibility, expandSpoilers, type SessionContext } from "./context.js";
export { logDebug, logError, logInfo, logWarning } from "./log.js";
export { type Connection, type Connector, deviceConnector, main, type RunOptions, runSession, serve } from "./main.js";
export { ComposerScreen, type ComposerOptions } from "./screens/composer.js";
export { ErrorScreen, type ErrorScreenOptions } from "./screens/error.js";
export { HelpScreen, helpHtml } from "./screens/help.js";
export { LoginScreen, type LoginOptions } from "./screens/login.js";
export { formatTimestamp, PostBlock, type PostBlockOptions, statsLine } from "./screens/post-block.js";
export { ThreadScreen, openThread } from "./screens/thread.js";
export { TimelineScreen } from "./screens/timeline.js";
export { TimelineTabs } from "./screens/timeline-tabs.js";
