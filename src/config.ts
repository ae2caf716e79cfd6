import { ConfigurationError } from './errors';

export const CONFIG_SECTION = 'markedPassages';

export const DEFAULT_DELIMITER_LEFT = '<<';
export const DEFAULT_DELIMITER_RIGHT = '>>';

/** Default decoration backgrounds for highlighted passages */
export const DEFAULT_HIGHLIGHT_COLORS = {
  light: 'rgba(255, 193, 7, 0.35)',
  dark: 'rgba(255, 179, 0, 0.28)',
} as const;

export interface Configuration {
  readonly delimiterLeft: string;
  readonly delimiterRight: string;
}

export interface HighlightColors {
  readonly light: string;
  readonly dark: string;
}

/**
 * Minimal view of a settings section. `vscode.WorkspaceConfiguration`
 * satisfies it, which keeps this module free of the editor API.
 */
export interface SettingsSection {
  get<T>(key: string, defaultValue: T): T;
}

/**
 * Build a delimiter configuration, rejecting empty delimiters.
 */
export function createConfiguration(
  delimiterLeft: string = DEFAULT_DELIMITER_LEFT,
  delimiterRight: string = DEFAULT_DELIMITER_RIGHT
): Configuration {
  if (delimiterLeft.length === 0) {
    throw new ConfigurationError('Left delimiter must not be empty');
  }
  if (delimiterRight.length === 0) {
    throw new ConfigurationError('Right delimiter must not be empty');
  }
  return { delimiterLeft, delimiterRight };
}

export const DEFAULT_CONFIGURATION: Configuration = createConfiguration();

export function readConfiguration(section: SettingsSection): Configuration {
  return createConfiguration(
    section.get<string>('delimiterLeft', DEFAULT_DELIMITER_LEFT),
    section.get<string>('delimiterRight', DEFAULT_DELIMITER_RIGHT)
  );
}

export function readHighlightColors(section: SettingsSection): HighlightColors {
  return {
    light: section.get<string>('highlightColor.light', DEFAULT_HIGHLIGHT_COLORS.light),
    dark: section.get<string>('highlightColor.dark', DEFAULT_HIGHLIGHT_COLORS.dark),
  };
}

/** Engine name used by the listing search action */
export function readDefaultSearchEngine(section: SettingsSection): string {
  return section.get<string>('defaultSearchEngine', 'Google');
}

export function readShowPassageCount(section: SettingsSection): boolean {
  return section.get<boolean>('showPassageCount', true);
}
