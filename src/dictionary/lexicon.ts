import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '../core/errors';

export interface TrieNode {
  children: Map<string, TrieNode>;
  end: boolean;
}

function newTrieNode(): TrieNode {
  return { children: new Map<string, TrieNode>(), end: false };
}

function normalize(word: string) {
  return word.trim().toUpperCase();
}

/**
 * Word list stored as a trie. Membership is exact after uppercasing; prefix
 * nodes are exposed for move generation.
 */
export class Lexicon {
  private readonly root: TrieNode = newTrieNode();
  private count = 0;

  constructor(words: Iterable<string> = []) {
    for (const word of words) this.add(word);
  }

  add(word: string): void {
    const norm = normalize(word);
    if (!norm) return;
    let node = this.root;
    for (const ch of norm) {
      let next = node.children.get(ch);
      if (!next) {
        next = newTrieNode();
        node.children.set(ch, next);
      }
      node = next;
    }
    if (!node.end) this.count += 1;
    node.end = true;
  }

  contains(word: string): boolean {
    const norm = normalize(word);
    if (!norm) return false;
    return this.node(norm)?.end ?? false;
  }

  hasPrefix(prefix: string): boolean {
    return this.node(normalize(prefix)) !== null;
  }

  /** Trie node reached by `prefix` (already uppercase), or null. */
  node(prefix = ''): TrieNode | null {
    let node: TrieNode | undefined = this.root;
    for (const ch of prefix) {
      node = node.children.get(ch);
      if (!node) return null;
    }
    return node;
  }

  get size(): number {
    return this.count;
  }

  /** All words in alphabetical order. */
  words(): string[] {
    const out: string[] = [];
    const walk = (node: TrieNode, prefix: string) => {
      if (node.end) out.push(prefix);
      const keys = [...node.children.keys()].sort();
      for (const key of keys) {
        const child = node.children.get(key);
        if (child) walk(child, prefix + key);
      }
    };
    walk(this.root, '');
    return out;
  }
}

function extractWord(line: string): string | null {
  // frequency lists look like: "word 12345"
  const raw = line.trim().split(/\s+/)[0];
  if (!raw) return null;
  if (!/^[A-Za-z]+$/.test(raw)) return null;
  return raw.toUpperCase();
}

export function lexiconFromText(text: string): Lexicon {
  const lexicon = new Lexicon();
  text
    .split('\n')
    .map(extractWord)
    .forEach((w) => {
      if (w) lexicon.add(w);
    });
  return lexicon;
}

export async function loadLexicon(path: string): Promise<Lexicon> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read dictionary ${path}`, err);
  }
  const lexicon = lexiconFromText(text);
  if (lexicon.size === 0) {
    throw new ConfigurationError(`Dictionary ${path} contains no usable words`);
  }
  return lexicon;
}
