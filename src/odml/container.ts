/**
 * Contract the property layer needs from the section that holds it.
 *
 * The section tree itself lives outside this package; a Property only keeps
 * a non-owning link to its container.
 */

import type { Property } from './Property.js';

export interface PropertyContainer {
  /** Path of the container in its document, e.g. "/Recording/Amplifier" */
  getPath(): string;
  /** Whether a sibling property of this name exists */
  containsProperty(name: string): boolean;
  /** Sibling property by name, or null */
  getProperty(name: string): Property | null;
  /** Rename the container; called when a "name" property changes its value */
  setName(newName: string): void;
}
