import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ByteCursor } from '#pe/ByteCursor.ts';
import { BufferSource } from '#pe/ByteSource.ts';
import { readDataDirectories } from '#pe/DataDirectory.ts';
import { NotEnoughBytesError } from '#pe/NotEnoughBytesError.ts';

function table(pairs: [number, number][]) {
  const buf = Buffer.alloc(pairs.length * 8);
  pairs.forEach(([address, size], i) => {
    buf.writeUInt32LE(address, i * 8);
    buf.writeUInt32LE(size, i * 8 + 4);
  });
  return buf;
}

describe('readDataDirectories', () => {
  it('should read pairs in the conventional order', () => {
    const cursor = new ByteCursor(new BufferSource(table([[0x2000, 0x40], [0x3000, 0x28], [0x5000, 0x1a0]])));
    const directories = readDataDirectories(cursor, 3);
    assert.deepEqual(directories.map(d => d.name), ['Export Table', 'Import Table', 'Resource Table']);
    assert.deepEqual(directories.map(d => d.index), [0, 1, 2]);
    assert.equal(directories[2]?.virtualAddress, 0x5000);
    assert.equal(directories[2]?.size, 0x1a0);
    assert.equal(cursor.position, 24);
  });

  it('should name entries past the sixteenth as unknown', () => {
    const pairs = Array.from({ length: 17 }, (): [number, number] => [0, 0]);
    const directories = readDataDirectories(new ByteCursor(new BufferSource(table(pairs))), 17);
    assert.equal(directories[14]?.name, 'CLR Runtime Header');
    assert.equal(directories[15]?.name, 'Reserved');
    assert.equal(directories[16]?.name, 'Unknown');
    assert.equal(directories[16]?.isEmpty, true);
  });

  it('should flag the certificate table address as a file offset', () => {
    const pairs = Array.from({ length: 5 }, (_, i): [number, number] => [0x100 * i, 8]);
    const directories = readDataDirectories(new ByteCursor(new BufferSource(table(pairs))), 5);
    assert.deepEqual(directories.map(d => d.isFileOffset), [false, false, false, false, true]);
  });

  it('should return an empty table for a count of 0', () => {
    assert.deepEqual(readDataDirectories(new ByteCursor(new BufferSource(Buffer.alloc(0))), 0), []);
  });

  it('should report a truncated table as end of data', () => {
    const cursor = new ByteCursor(new BufferSource(table([[1, 2]])));
    assert.throws(() => readDataDirectories(cursor, 2), NotEnoughBytesError);
  });
});
