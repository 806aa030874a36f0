/**
 * RecursiveDict: dotted-path access over a YAML document
 *
 *   dict.get('appservice.provisioning.shared_secret')
 *   dict.set('bridge.relaybot.authless_portals', true)
 *
 * Reads treat a missing intermediate map as empty, writes create it.
 * The document keeps its comments and key order, so a migrated base
 * template is written back looking like the template.
 *
 * Nodes handed out by getNode() and entries() never contain aliases:
 * an anchor only exists in its own document, so aliased values are
 * resolved before they can be copied into another one.
 */

import { Document, isAlias, isMap, isNode, isScalar, parseDocument, visit, YAMLMap } from 'yaml';

export class RecursiveDict {
  constructor(protected doc: Document = new Document({})) {}

  /** Parse YAML text. Syntax errors are thrown as reported by the parser. */
  static parse(text: string): RecursiveDict {
    const doc = parseDocument(text);
    if (doc.errors.length > 0) {
      throw doc.errors[0];
    }
    return new RecursiveDict(doc);
  }

  get document(): Document {
    return this.doc;
  }

  /** The plain value at `key`, or `defaultValue` when the key is absent. */
  get(key: string, defaultValue?: unknown): unknown {
    const node = this.getNode(key);
    if (node === undefined) return defaultValue;
    return isNode(node) ? node.toJS(this.doc) : node;
  }

  /** The YAML node at `key`, comments included. */
  getNode(key: string): unknown {
    const segments = key.split('.');
    const map = this.findMap(segments.slice(0, -1));
    return map ? this.withoutAliases(map.get(segments[segments.length - 1], true)) : undefined;
  }

  /** True when the key holds a value other than null. */
  has(key: string): boolean {
    const value = this.get(key);
    return value !== undefined && value !== null;
  }

  set(key: string, value: unknown): void {
    const segments = key.split('.');
    this.assign(this.ensureMap(segments.slice(0, -1)), segments[segments.length - 1], value);
  }

  /** Set a key of the map at `path` without splitting the key on dots. */
  setChild(path: string, childKey: string, value: unknown): void {
    this.assign(this.ensureMap(path.split('.')), childKey, value);
  }

  delete(key: string): void {
    const segments = key.split('.');
    this.findMap(segments.slice(0, -1))?.delete(segments[segments.length - 1]);
  }

  /** Key and value node pairs of the map at `key`; empty if it is not a map. */
  entries(key: string): Array<[string, unknown]> {
    const node: unknown = this.getNode(key);
    if (!isMap(node)) return [];
    return node.items.map((pair): [string, unknown] => [
      isScalar(pair.key) ? String(pair.key.value) : String(pair.key),
      this.withoutAliases(pair.value),
    ]);
  }

  toJSON(): unknown {
    return this.doc.toJS();
  }

  toString(): string {
    return this.doc.toString({ indent: 4 });
  }

  private findMap(segments: string[]): YAMLMap | null {
    let current: unknown = this.doc.contents;
    for (const segment of segments) {
      if (!isMap(current)) return null;
      current = this.dereference(current.get(segment, true));
    }
    return isMap(current) ? current : null;
  }

  private dereference(node: unknown): unknown {
    return isAlias(node) ? node.resolve(this.doc) : node;
  }

  /** `node` itself, or a plain copy of its resolved value if it holds an alias. */
  private withoutAliases(node: unknown): unknown {
    if (!isNode(node) || isScalar(node)) return node;
    let aliased = isAlias(node);
    if (!aliased) {
      visit(node, {
        Alias: () => {
          aliased = true;
          return visit.BREAK;
        },
      });
    }
    return aliased ? this.doc.createNode(node.toJS(this.doc)) : node;
  }

  private ensureMap(segments: string[]): YAMLMap {
    let map: YAMLMap;
    if (isMap(this.doc.contents)) {
      map = this.doc.contents;
    } else {
      map = new YAMLMap();
      this.doc.contents = map;
    }

    for (const segment of segments) {
      const next: unknown = map.get(segment, true);
      if (isMap(next)) {
        map = next;
      } else {
        const created = new YAMLMap();
        map.set(segment, created);
        map = created;
      }
    }
    return map;
  }

  private assign(map: YAMLMap, key: string, value: unknown): void {
    const incoming = isScalar(value) ? value.value : value;
    const existing: unknown = map.get(key, true);

    // Overwrite scalars in place so the template's comments stay attached.
    if (isScalar(existing) && (incoming === null || typeof incoming !== 'object')) {
      existing.value = incoming;
      return;
    }
    map.set(key, isNode(incoming) ? incoming.clone() : this.doc.createNode(incoming));
  }
}
