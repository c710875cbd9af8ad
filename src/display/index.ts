export * from './colors';
export * from './DetailsRenderer';
export * from './TextRenderer';
export * from './browser/BrowserState';
export * from './browser/TerminalBrowser';
