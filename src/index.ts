export { ApplicationServer, HEALTH_PATH } from './lib/app-server.js'
export type { BindOptions, PageRequestHandler, PageResponse } from './lib/app-server.js'
export { RemoteScriptBridge } from './lib/bridge.js'
export { ChromiumShell } from './lib/chromium-shell.js'
export type { ChromiumShellOptions } from './lib/chromium-shell.js'
export {
  DEFAULT_TEST_ID_ATTRIBUTE,
  resolveSessionConfig,
  sessionConfigSchema,
} from './lib/config.js'
export type { SessionConfig, SessionConfigInput } from './lib/config.js'
export { ElectronShell } from './lib/electron-shell.js'
export type { ElectronShellOptions } from './lib/electron-shell.js'
export type { ErrorCode } from './lib/error-codes.js'
export { describeError, HarnessError, isHarnessError } from './lib/errors.js'
export { harnessClientSource } from './lib/harness-client.js'
export {
  queryByTestId,
  testIdSelector,
  triggerKeyPress,
  triggerMouseMove,
  waitFor,
} from './lib/interactions.js'
export type { WaitForOptions } from './lib/interactions.js'
export { js, JsExpression, RemoteHandle } from './lib/js.js'
export { h, raw, renderDocument, renderNode } from './lib/page.js'
export type { AttributeValue, ElementNode, PageChild, PageNode, PageRoot, RawHtml } from './lib/page.js'
export { PlaywrightWindow } from './lib/playwright-window.js'
export { openRunLogger } from './lib/run-log.js'
export type { LogLevel, LogRecord, LogSource, RunLogger } from './lib/run-log.js'
export { createTestSession, TestSession, withTestSession } from './lib/test-session.js'
export type { SessionOptions } from './lib/test-session.js'
export type {
  BrowserShell,
  JsonValue,
  LifecycleState,
  PageBuilder,
  Readiness,
  ShellWindow,
  WindowRequest,
} from './lib/types.js'
