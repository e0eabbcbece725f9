export { IDisplay, DisplayConfig, PromptOption } from './types';
export { ConsoleDisplay, createConsoleDisplay } from './console.adapter';
export { MockDisplay } from './mock.adapter';
