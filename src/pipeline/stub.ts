// Replacement for the vendor's claude-native addon. The real module is a
// Windows binary; this one reports a fixed OS version, says the window is
// never maximized, and accepts every other call without doing anything.

/** Key identifiers the app reads from `KeyboardKey`. Values must match the vendor enum. */
export const KEYBOARD_KEYS = Object.freeze({
  Backspace: 43,
  Tab: 280,
  Enter: 261,
  Shift: 272,
  Control: 61,
  Alt: 40,
  CapsLock: 56,
  Escape: 85,
  Space: 276,
  PageUp: 251,
  PageDown: 250,
  End: 83,
  Home: 154,
  LeftArrow: 175,
  UpArrow: 282,
  RightArrow: 262,
  DownArrow: 81,
  Delete: 79,
  Meta: 187,
} as const);

export const STUB_WINDOWS_VERSION = "10.0.0";

/** Exported functions and what each returns. `undefined` marks a no-op. */
export const STUB_CAPABILITIES: ReadonlyArray<readonly [name: string, returns: string | boolean | undefined]> = [
  ["getWindowsVersion", STUB_WINDOWS_VERSION],
  ["setWindowEffect", undefined],
  ["removeWindowEffect", undefined],
  ["getIsMaximized", false],
  ["flashFrame", undefined],
  ["clearFlashFrame", undefined],
  ["showNotification", undefined],
  ["setProgressBar", undefined],
  ["clearProgressBar", undefined],
  ["setOverlayIcon", undefined],
  ["clearOverlayIcon", undefined],
];

export const STUB_MODULE_PATH = ["node_modules", "claude-native", "index.js"] as const;

function renderBody(returns: string | boolean | undefined): string {
  return returns === undefined ? "{}" : JSON.stringify(returns);
}

/** CommonJS source for the stub, identical on every call. */
export function renderStubModule(): string {
  const keys = Object.entries(KEYBOARD_KEYS).map(([name, code]) => `  ${name}: ${code}`);
  const exportsList = STUB_CAPABILITIES.map(([name, returns]) => `  ${name}: () => ${renderBody(returns)},`);
  return [
    "// Stub implementation of claude-native using KeyboardKey enum values",
    "const KeyboardKey = {",
    keys.join(",\n"),
    "};",
    "",
    "Object.freeze(KeyboardKey);",
    "",
    "module.exports = {",
    ...exportsList,
    "  KeyboardKey",
    "};",
    "",
  ].join("\n");
}
