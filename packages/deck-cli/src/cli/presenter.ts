import type { Presenter } from './types.js';
import type { DeckError } from '@deckwright/core';

export const consolePresenter: Presenter = {
  write: message => {
    process.stdout.write(`${message}\n`);
  },
  error: message => {
    process.stderr.write(`${message}\n`);
  },
};

export function presentError(presenter: Presenter, error: DeckError): void {
  presenter.error(`${error.code}: ${error.message}`);
  if (error.hint) {
    presenter.error(`Hint: ${error.hint}`);
  }
}
