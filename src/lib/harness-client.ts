import { inlineJson } from './page.js'

/** Global the helper script installs in every served page. */
export const HARNESS_GLOBAL = '__harness'

/**
 * In-page helper module. Installs `globalThis.__harness` with the readiness flag and
 * init-error slot of one serve cycle, the handle table used by the bridge (lookups are checked
 * against the cycle), and the input synthesis helpers. Kept as plain source so it is served verbatim to the page.
 */
export const harnessClientSource = `function installHarness(scope, config) {
  var pending = [];
  var describe = function (error) {
    if (error && typeof error === 'object' && 'message' in error) return String(error.message);
    return String(error);
  };
  var harness = {
    cycle: config.cycle,
    ready: false,
    error: null,
    handles: {},
    nextHandle: 0,
    retain: function (value) {
      if (value === null || value === undefined) {
        throw new Error('Cannot resolve a handle to ' + value);
      }
      harness.nextHandle += 1;
      harness.handles[harness.nextHandle] = value;
      return harness.nextHandle;
    },
    handle: function (id, cycle) {
      if (cycle !== harness.cycle) {
        throw new Error(
          'Handle ' + id + ' belongs to serve cycle ' + cycle + ', the page is at cycle ' + harness.cycle,
        );
      }
      if (!Object.prototype.hasOwnProperty.call(harness.handles, id)) {
        throw new Error('Unknown handle ' + id);
      }
      return harness.handles[id];
    },
    waitUntil: function (promise) {
      pending.push(Promise.resolve(promise));
    },
    keyPress: function (code, target) {
      var element = target || document;
      element.dispatchEvent(new KeyboardEvent('keydown', { key: code, code: code, bubbles: true }));
      element.dispatchEvent(new KeyboardEvent('keyup', { key: code, code: code, bubbles: true }));
    },
    mouseMove: function (position, target) {
      var element = target || document.querySelector('canvas');
      if (!element) throw new Error('No target given and no canvas element found');
      element.dispatchEvent(
        new MouseEvent('mousemove', { clientX: position[0], clientY: position[1], bubbles: true }),
      );
    },
  };
  var fail = function (error) {
    if (harness.ready || harness.error !== null) return;
    harness.error = describe(error);
  };
  var settle = function () {
    var batch = pending.splice(0);
    if (batch.length === 0) {
      if (harness.error === null) harness.ready = true;
      return;
    }
    Promise.all(batch).then(settle, fail);
  };
  scope.addEventListener('error', function (event) {
    fail(event.error || event.message);
  });
  scope.addEventListener('unhandledrejection', function (event) {
    fail(event.reason);
  });
  if (document.readyState === 'complete') {
    settle();
  } else {
    scope.addEventListener('load', settle);
  }
  scope.${HARNESS_GLOBAL} = harness;
}`

/** Bootstrap statement for one serve cycle, for an inline `<script>` in the page head. */
export const harnessBootstrap = (cycle: number): string =>
  `(${harnessClientSource})(globalThis, ${inlineJson({ cycle })});`
