/**
 * Function-calling adapter
 *
 * Exposes a Cell as an LLM tool: the role becomes the function name, the
 * input schema becomes its parameters, and `ainvoke` routes tool-call
 * arguments through the Cell's JSON entry point.
 */

import type { CellLike } from '../cells/cell.js';
import { CellResponseEnvelope } from '../cells/response.js';
import { isRecord } from '../schema/introspect.js';
import { replaceRefsWithDefs, type FunctionDefinition } from '../schema/jsonSchemaCleaner.js';

export class FunctionCell {
  readonly name: string;
  readonly description: string;
  private readonly cell: CellLike;

  constructor(cell: CellLike) {
    this.cell = cell;
    this.name = cell.getRole();
    this.description = cell.getDescription();
  }

  /**
   * Input argument schemas keyed by argument name.
   */
  get args(): Record<string, unknown> {
    const properties = this.cell.getInputSchema()['properties'];
    if (!isRecord(properties)) {
      throw new Error(`No input properties found in the cell: ${this.name}`);
    }
    return properties;
  }

  get definition(): FunctionDefinition {
    return replaceRefsWithDefs({
      ...this.cell.getInputSchema(),
      title: this.name,
      description: this.description,
    });
  }

  /**
   * Run the Cell with tool-call arguments.
   *
   * @param input - JSON string as emitted by the model, or an already-decoded object
   * @returns Validated output on success, the error message on failure
   */
  async ainvoke(input: string | Record<string, unknown>): Promise<unknown> {
    let inputJson: string;
    if (typeof input === 'string') {
      inputJson = input;
    } else {
      try {
        inputJson = JSON.stringify(input);
      } catch (error) {
        throw new TypeError(`Input could not be serialized to JSON: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
      }
    }

    const response = CellResponseEnvelope.parse(JSON.parse(await this.cell.run(inputJson)));
    return response.content;
  }

  toString(): string {
    return `${this.name}()`;
  }
}

export function cellsToFunctions(cells: CellLike[]): FunctionCell[] {
  return cells.map(cell => new FunctionCell(cell));
}
