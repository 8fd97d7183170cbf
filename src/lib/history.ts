import type { Command } from './commands';

export const DEFAULT_HISTORY_DEPTH = 500;

/** Bounded undo/redo stacks. The oldest undo entry is evicted past maxDepth. */
export class CommandHistory {
  private undoStack: Command[] = [];
  private redoStack: Command[] = [];
  readonly maxDepth: number;

  constructor(maxDepth: number = DEFAULT_HISTORY_DEPTH) {
    if (!Number.isInteger(maxDepth) || maxDepth < 1) throw new Error(`Invalid history depth: ${maxDepth}`);
    this.maxDepth = maxDepth;
  }

  push(command: Command): void {
    command.execute();
    this.undoStack.push(command);
    while (this.undoStack.length > this.maxDepth) this.undoStack.shift();
    this.redoStack = [];
  }

  undo(): Command | null {
    const command = this.undoStack.pop();
    if (!command) return null;
    command.undo();
    this.redoStack.push(command);
    while (this.redoStack.length > this.maxDepth) this.redoStack.shift();
    return command;
  }

  redo(): Command | null {
    const command = this.redoStack.pop();
    if (!command) return null;
    command.execute();
    this.undoStack.push(command);
    while (this.undoStack.length > this.maxDepth) this.undoStack.shift();
    return command;
  }

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get undoCount(): number {
    return this.undoStack.length;
  }

  get redoCount(): number {
    return this.redoStack.length;
  }

  get undoLabel(): string | null {
    return this.undoStack.at(-1)?.label ?? null;
  }

  get redoLabel(): string | null {
    return this.redoStack.at(-1)?.label ?? null;
  }

  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
  }
}
