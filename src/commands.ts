import { randomUUID } from "node:crypto";
import { AppError, notFound } from "./utils";

export type SavedCommand = {
  id: string;
  command: string;
  createdAt: string;
  updatedAt: string;
};

export class CommandBook {
  private readonly commands: SavedCommand[] = [];
  private tail: Promise<void> = Promise.resolve();

  private async withLock<T>(task: () => T): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return await run;
  }

  private normalize(command: string): string {
    const trimmed = command.trim();
    if (!trimmed) {
      throw new AppError(400, "Command cannot be empty.", "parse_error");
    }
    return trimmed;
  }

  private indexOf(id: string): number {
    const index = this.commands.findIndex((entry) => entry.id === id);
    if (index < 0) {
      throw notFound(`Saved command ${id} not found.`);
    }
    return index;
  }

  async add(command: string): Promise<SavedCommand> {
    return await this.withLock(() => {
      const now = new Date().toISOString();
      const entry: SavedCommand = {
        id: randomUUID(),
        command: this.normalize(command),
        createdAt: now,
        updatedAt: now,
      };
      this.commands.push(entry);
      return { ...entry };
    });
  }

  async list(): Promise<SavedCommand[]> {
    return await this.withLock(() => this.commands.map((entry) => ({ ...entry })));
  }

  async update(id: string, command: string): Promise<SavedCommand> {
    return await this.withLock(() => {
      const entry = this.commands[this.indexOf(id)];
      entry.command = this.normalize(command);
      entry.updatedAt = new Date().toISOString();
      return { ...entry };
    });
  }

  async remove(id: string): Promise<void> {
    await this.withLock(() => {
      this.commands.splice(this.indexOf(id), 1);
    });
  }
}
