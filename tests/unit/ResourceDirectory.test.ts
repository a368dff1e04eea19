import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ByteCursor } from '#pe/ByteCursor.ts';
import { BufferSource } from '#pe/ByteSource.ts';
import { NotEnoughBytesError } from '#pe/NotEnoughBytesError.ts';
import { PEFormatError } from '#pe/PEFormatError.ts';
import {
  MAX_RESOURCE_ENTRIES,
  ResourceDirectory,
  ResourceDirectoryEntry,
  type TreeWalk,
} from '#pe/ResourceDirectory.ts';

const BASE = 0x10;
const NAMED = 0x80000000;
const SUBDIR = 0x80000000;

/** Little helper for laying out tree bytes at offsets relative to BASE. */
class TreeBytes {
  readonly buf: Buffer;

  constructor(size: number) {
    this.buf = Buffer.alloc(BASE + size, 0xcc);
  }

  directory(at: number, named: number, ids: number, characteristics = 0) {
    this.buf.writeUInt32LE(characteristics, BASE + at);
    this.buf.writeUInt32LE(0x5f5e1000, BASE + at + 4);
    this.buf.writeUInt16LE(4, BASE + at + 8);
    this.buf.writeUInt16LE(1, BASE + at + 10);
    this.buf.writeUInt16LE(named, BASE + at + 12);
    this.buf.writeUInt16LE(ids, BASE + at + 14);
  }

  entry(at: number, nameField: number, offsetField: number) {
    this.buf.writeUInt32LE(nameField >>> 0, BASE + at);
    this.buf.writeUInt32LE(offsetField >>> 0, BASE + at + 4);
  }

  data(at: number, rva: number, size: number, codepage = 0, reserved = 0) {
    this.buf.writeUInt32LE(rva, BASE + at);
    this.buf.writeUInt32LE(size, BASE + at + 4);
    this.buf.writeUInt32LE(codepage, BASE + at + 8);
    this.buf.writeUInt32LE(reserved, BASE + at + 12);
  }

  name(at: number, text: string) {
    this.buf.writeUInt16LE(text.length, BASE + at);
    this.buf.write(text, BASE + at + 2, 'utf16le');
  }

  cursor(at = 0) {
    return new ByteCursor(new BufferSource(this.buf), BASE + at);
  }
}

/** Root with two named leaves, ALPHA and BETA. */
function twoNamedLeaves() {
  const tree = new TreeBytes(0x60);
  tree.directory(0, 2, 0);
  tree.entry(16, NAMED | 0x40, 0x20);
  tree.entry(24, NAMED | 0x50, 0x30);
  tree.data(0x20, 0x1000, 0x10, 1252);
  tree.data(0x30, 0x1100, 0x20);
  tree.name(0x40, 'ALPHA');
  tree.name(0x50, 'BETA');
  return tree;
}

const freshWalk = (): TreeWalk => ({ base: BASE, branch: new Set(), depth: 0, visited: { entries: 0 } });

function formatError(offset: number, reason: string) {
  return (err: unknown) => {
    assert.ok(err instanceof PEFormatError);
    assert.equal(err.offset, offset);
    assert.equal(err.reason, reason);
    return true;
  };
}

describe('ResourceDirectory', () => {
  describe('named entries', () => {
    it('should resolve sibling names and end after the entry table', () => {
      const cursor = twoNamedLeaves().cursor();
      const root = ResourceDirectory.read(cursor);

      assert.deepEqual([...root.nameEntries.keys()], ['ALPHA', 'BETA']);
      assert.equal(root.idEntries.size, 0);
      assert.equal(root.timeDateStamp, 0x5f5e1000);
      assert.equal(root.majorVersion, 4);
      assert.equal(root.minorVersion, 1);
      assert.equal(cursor.position, BASE + 32);

      const alpha = root.nameEntries.get('ALPHA');
      assert.equal(alpha?.payload.kind, 'data');
      if (alpha?.payload.kind === 'data') {
        assert.equal(alpha.payload.data.rva, 0x1000);
        assert.equal(alpha.payload.data.size, 0x10);
        assert.equal(alpha.payload.data.codepage, 1252);
        assert.equal(alpha.payload.data.offset, BASE + 0x20);
      }
    });

    it('should restore the cursor after each name detour', () => {
      const cursor = twoNamedLeaves().cursor(16);
      const walk = freshWalk();

      const first = ResourceDirectoryEntry.read(cursor, walk, true);
      assert.deepEqual(first.key, { kind: 'name', name: 'ALPHA' });
      assert.equal(cursor.position, BASE + 24);

      const second = ResourceDirectoryEntry.read(cursor, walk, true);
      assert.deepEqual(second.key, { kind: 'name', name: 'BETA' });
      assert.equal(cursor.position, BASE + 32);
    });

    it('should keep lone surrogates in names', () => {
      const tree = new TreeBytes(0x40);
      tree.directory(0, 1, 0);
      tree.entry(16, NAMED | 0x30, 0x18);
      tree.data(0x18, 0, 0);
      tree.buf.writeUInt16LE(2, BASE + 0x30);
      tree.buf.writeUInt16LE(0xd800, BASE + 0x32);
      tree.buf.writeUInt16LE(0x41, BASE + 0x34);
      const root = ResourceDirectory.read(tree.cursor());
      assert.deepEqual([...root.nameEntries.keys()], ['\uD800A']);
    });

    it('should report a name running off the end as end of data', () => {
      const tree = new TreeBytes(0x2c);
      tree.directory(0, 1, 0);
      tree.entry(16, NAMED | 0x28, 0x18);
      tree.data(0x18, 0, 0);
      tree.buf.writeUInt16LE(10, BASE + 0x28);
      assert.throws(() => ResourceDirectory.read(tree.cursor()), NotEnoughBytesError);
    });
  });

  describe('nesting', () => {
    it('should resolve child offsets against the tree base, not the parent', () => {
      const tree = new TreeBytes(0x58);
      tree.directory(0, 0, 1);
      tree.entry(16, 3, SUBDIR | 0x18);
      tree.directory(0x18, 0, 1);
      tree.entry(0x28, 1, SUBDIR | 0x30);
      tree.directory(0x30, 0, 1);
      tree.entry(0x40, 0x409, 0x48);
      tree.data(0x48, 0x2000, 0x100, 0);

      const root = ResourceDirectory.read(tree.cursor());
      const type = root.idEntries.get(3)?.payload;
      assert.equal(type?.kind, 'directory');
      if (type?.kind !== 'directory') return;
      const name = type.directory.idEntries.get(1)?.payload;
      assert.equal(name?.kind, 'directory');
      if (name?.kind !== 'directory') return;
      assert.equal(name.directory.offset, BASE + 0x30);
      const language = name.directory.idEntries.get(0x409)?.payload;
      assert.equal(language?.kind, 'data');
      if (language?.kind === 'data') {
        assert.equal(language.data.rva, 0x2000);
        assert.equal(language.data.size, 0x100);
      }
    });

    it('should list named entries before id entries', () => {
      const tree = new TreeBytes(0x70);
      tree.directory(0, 1, 1);
      tree.entry(16, NAMED | 0x60, 0x20);
      tree.entry(24, 7, 0x30);
      tree.data(0x20, 0, 0);
      tree.data(0x30, 0, 0);
      tree.name(0x60, 'X');
      const root = ResourceDirectory.read(tree.cursor());
      assert.deepEqual([...root.entries()].map(e => e.key), [{ kind: 'name', name: 'X' }, { kind: 'id', id: 7 }]);
    });

    it('should reject a directory that contains itself', () => {
      const tree = new TreeBytes(0x18);
      tree.directory(0, 0, 1);
      tree.entry(16, 1, SUBDIR | 0);
      assert.throws(() => ResourceDirectory.read(tree.cursor()), formatError(BASE, 'Resource directory cycle'));
    });

    it('should put the offset in the error message', () => {
      const tree = new TreeBytes(0x18);
      tree.directory(0, 0, 1);
      tree.entry(16, 1, SUBDIR | 0);
      assert.throws(() => ResourceDirectory.read(tree.cursor()), { message: 'Resource directory cycle at 0x10' });
    });

    it('should reject chains nested deeper than the limit', () => {
      const levels = 34;
      const tree = new TreeBytes(levels * 24);
      for (let i = 0; i < levels; i++) {
        tree.directory(i * 24, 0, 1);
        tree.entry(i * 24 + 16, 1, SUBDIR | ((i + 1) * 24));
      }
      assert.throws(
        () => ResourceDirectory.read(tree.cursor()),
        formatError(BASE + 33 * 24, 'Resource directory nesting too deep'),
      );
    });
  });

  describe('shared subtrees', () => {
    /** Three levels of `fanOut` ids, every entry of a level pointing at the same child. */
    function fanOutTree(fanOut: number) {
      const size = 16 + fanOut * 8;
      const tree = new TreeBytes(size * 3 + 16);
      for (let level = 0; level < 3; level++) {
        const at = level * size;
        tree.directory(at, 0, fanOut);
        for (let i = 0; i < fanOut; i++) {
          const target = level < 2 ? SUBDIR | ((level + 1) * size) : size * 3;
          tree.entry(at + 16 + i * 8, i + 1, target);
        }
      }
      tree.data(size * 3, 0x1000, 4);
      return tree;
    }

    it('should decode a subtree reached from several entries', () => {
      const root = ResourceDirectory.read(fanOutTree(3).cursor());
      const first = root.idEntries.get(1)?.payload;
      const third = root.idEntries.get(3)?.payload;
      assert.equal(first?.kind, 'directory');
      assert.equal(third?.kind, 'directory');
      if (first?.kind === 'directory' && third?.kind === 'directory') {
        assert.equal(first.directory.offset, third.directory.offset);
      }
    });

    it('should stop once the walk decodes too many entries', () => {
      assert.equal(MAX_RESOURCE_ENTRIES, 0x10000);
      // 100 x 100 x 100 entries; each root entry covers 1 + 100 * 101 decodes.
      // Entry 0x10001 is root entry 6, its 49th child and that child's 81st entry.
      const level2 = 2 * (16 + 100 * 8);
      assert.throws(
        () => ResourceDirectory.read(fanOutTree(100).cursor()),
        formatError(BASE + level2 + 16 + 80 * 8, 'Too many resource entries'),
      );
    });
  });

  describe('validation', () => {
    it('should reject a named entry in an id slot', () => {
      const tree = twoNamedLeaves();
      tree.directory(0, 0, 2);
      assert.throws(() => ResourceDirectory.read(tree.cursor()), formatError(BASE + 16, 'Named/id resource entry mismatch'));
    });

    it('should reject an id entry in a named slot', () => {
      const tree = twoNamedLeaves();
      tree.entry(24, 5, 0x30);
      assert.throws(() => ResourceDirectory.read(tree.cursor()), formatError(BASE + 24, 'Named/id resource entry mismatch'));
    });

    it('should reject non-zero directory characteristics', () => {
      const tree = twoNamedLeaves();
      tree.directory(0, 2, 0, 1);
      assert.throws(
        () => ResourceDirectory.read(tree.cursor()),
        formatError(BASE, 'Resource directory characteristics must be zero'),
      );
    });

    it('should reject a non-zero reserved field in a data entry', () => {
      const tree = twoNamedLeaves();
      tree.data(0x30, 0x1100, 0x20, 0, 7);
      assert.throws(
        () => ResourceDirectory.read(tree.cursor()),
        formatError(BASE + 0x3c, 'Resource data entry reserved field must be zero'),
      );
    });

    it('should reject duplicate ids in one directory', () => {
      const tree = new TreeBytes(0x40);
      tree.directory(0, 0, 2);
      tree.entry(16, 3, 0x20);
      tree.entry(24, 3, 0x30);
      tree.data(0x20, 0, 0);
      tree.data(0x30, 0, 0);
      assert.throws(
        () => ResourceDirectory.read(tree.cursor()),
        formatError(BASE + 24, 'Duplicate resource directory entry'),
      );
    });
  });
});
