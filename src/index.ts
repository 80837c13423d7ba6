export { MainMenu } from './core/main-menu.js';
export type { MainMenuOptions, Runnable } from './core/main-menu.js';
export { SubMenu } from './core/sub-menu.js';
export type { SubMenuOptions } from './core/sub-menu.js';
export { MenuOptionSet, RESERVED_OPERATION_NAMES } from './core/menu-option-set.js';
export type { MenuEntry, MenuOptionSetOptions, MenuSelection } from './core/menu-option-set.js';
export { ParameterCollector } from './core/parameter-collector.js';
export { ValueBuilder } from './core/value-builder.js';
export { ConstructorRegistry } from './core/constructor-registry.js';
export { defineOperation } from './core/operations.js';
export type { Constructor, MenuTarget, Operation } from './core/operations.js';
export { ArgumentList, param, t } from './core/value-types.js';
export type { Parameter, TypeShape, ValueType } from './core/value-types.js';
export { ScalarPrompt } from './core/scalar-prompt.js';
export type { ReadMode } from './core/scalar-prompt.js';
export { SCALAR_PARSERS, parseArraySize } from './core/parsers.js';
export type { ScalarKind, ScalarParser, ScalarValues } from './core/parsers.js';
export { InputReader, ReadlineLineSource } from './core/input-reader.js';
export type { LineSource } from './core/input-reader.js';
export { MenuConsole, closeDefaultConsole, getDefaultConsole } from './core/menu-console.js';
export type { MenuConsoleOptions } from './core/menu-console.js';
export {
  DEFAULT_TITLE_HEIGHT,
  DEFAULT_TITLE_WIDTH,
  loadMenuSettings,
  menuSettingsSchema,
  resolveMenuSettings,
} from './core/config.js';
export type { ClearScreenMode, MenuSettings, MenuSettingsInput } from './core/config.js';
export { Screen, SEPARATOR, frameTitle } from './ui/screen.js';
export type { OutputSink } from './ui/screen.js';
export { getMessages } from './ui/messages.js';
export type { Locale, Messages } from './ui/messages.js';
export * from './utils/errors.js';
