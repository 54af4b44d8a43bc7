/**
 * Command: editor operations as objects, with undo.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';

class Editor {
  text = '';
}

interface EditorCommand {
  readonly label: string;
  execute(): void;
  undo(): void;
}

function appendCommand(editor: Editor, fragment: string): EditorCommand {
  return {
    label: `append "${fragment}"`,
    execute: () => {
      editor.text += fragment;
    },
    undo: () => {
      editor.text = editor.text.slice(0, editor.text.length - fragment.length);
    },
  };
}

class CommandHistory {
  private readonly done: EditorCommand[] = [];

  run(command: EditorCommand): void {
    command.execute();
    this.done.push(command);
  }

  undo(): EditorCommand | undefined {
    const command = this.done.pop();
    command?.undo();
    return command;
  }
}

export const COMMAND_OUTCOME = [
  'append "Hello" -> Hello',
  'append ", world" -> Hello, world',
  'undo append ", world" -> Hello',
];

export class CommandExample implements PatternExample {
  setup(): void {}

  run(): readonly string[] {
    const editor = new Editor();
    const history = new CommandHistory();
    const lines: string[] = [];

    for (const fragment of ['Hello', ', world']) {
      const command = appendCommand(editor, fragment);
      history.run(command);
      lines.push(`${command.label} -> ${editor.text}`);
    }

    const undone = history.undo();
    if (undone) {
      lines.push(`undo ${undone.label} -> ${editor.text}`);
    }
    return lines;
  }

  describe(): ExampleDescription {
    return {
      name: 'Command',
      intent: 'Encapsulate a request as an object so it can be queued, logged or undone',
    };
  }
}
