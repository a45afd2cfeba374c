/**
 * @module tasks/omni-demo/keyboard
 * @description Space-bar pause/resume and quit keys for the terminal demo
 */

import * as readline from 'readline';

export type KeyAction = 'toggle' | 'quit' | 'none';

export interface KeyboardHandlers {
    onToggle: () => void;
    onQuit: () => void;
}

/**
 * Map a keypress to a demo action
 */
export function keyAction(key: readline.Key | undefined): KeyAction {
    if (!key) return 'none';
    if (key.name === 'space') return 'toggle';
    if (key.name === 'q' || key.name === 'escape' || (key.ctrl && key.name === 'c')) return 'quit';
    return 'none';
}

/**
 * Listen for keypresses on `input`; returns a function that detaches and restores the terminal
 */
export function attachKeyboard(input: NodeJS.ReadStream, handlers: KeyboardHandlers): () => void {
    readline.emitKeypressEvents(input);
    const raw = input.isTTY === true;
    if (raw) input.setRawMode(true);

    const listener = (_chunk: string | undefined, key: readline.Key | undefined): void => {
        switch (keyAction(key)) {
            case 'toggle':
                handlers.onToggle();
                break;
            case 'quit':
                handlers.onQuit();
                break;
            case 'none':
                break;
        }
    };

    input.on('keypress', listener);
    input.resume();

    return () => {
        input.removeListener('keypress', listener);
        if (raw) input.setRawMode(false);
        input.pause();
    };
}
