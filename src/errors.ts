/**
 * Base class for the recoverable failures of marked-passage commands.
 * Command handlers show the message to the user; none of these end the session.
 */
export class MarkedPassageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A delimiter is empty or otherwise unusable. */
export class ConfigurationError extends MarkedPassageError {}

/** A search was requested without any text to search for. */
export class NoQueryError extends MarkedPassageError {
  constructor(message = 'No marked passage text to search for') {
    super(message);
  }
}

/** The search engine chooser was dismissed. */
export class NoEngineSelectedError extends MarkedPassageError {
  constructor(message = 'No search engine selected') {
    super(message);
  }
}

/** A listing action ran on a line that carries no report entry. */
export class NoEntryError extends MarkedPassageError {
  constructor(message = 'No marked passage on this line') {
    super(message);
  }
}
