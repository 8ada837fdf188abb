// Section root: a loadable component without a default check

import { Loadable } from "./runtime/loadable";

/**
 * A component nested inside a page (a header, a modal, a results list).
 * Sections start with no load validations; declare their own.
 */
export abstract class Section extends Loadable {
  /**
   * The object this section was found in, when it has one
   */
  readonly parent: Loadable | undefined;

  constructor(parent?: Loadable) {
    super();
    this.parent = parent;
  }
}
