/**
 * Document Tests
 */

import { describe, test, expect } from 'vitest';
import { TextBuffer } from '../../../src/core/buffer.ts';
import { CursorSet } from '../../../src/core/cursor.ts';
import { normalizeBatch } from '../../../src/core/edit.ts';
import { OutOfRangeError } from '../../../src/core/errors.ts';
import { Document, detectLineEnding } from '../../../src/state/document.ts';

function insertAt(document: Document, offset: number, text: string): Document {
  return document.commit(
    normalizeBatch([{ from: offset, to: offset, text }]),
    CursorSet.single(offset + text.length),
    'typing'
  );
}

describe('Document', () => {
  // ─────────────────────────────────────────────────────────────────────────
  // Commit
  // ─────────────────────────────────────────────────────────────────────────

  describe('commit', () => {
    test('moves text, cursors, revision and dirty range together', () => {
      const before = Document.create('hello world');
      const after = insertAt(before, 5, 'x');

      expect(after.buffer.toString()).toBe('hellox world');
      expect(after.revision).toBe(1);
      expect(after.dirty).toEqual({ from: 5, to: 6 });
      expect(after.cursors.primaryCursor.head).toBe(6);
      expect(after.journal).toHaveLength(1);
      expect(after.isModified).toBe(true);

      expect(before.buffer.toString()).toBe('hello world');
      expect(before.revision).toBe(0);
      expect(before.isModified).toBe(false);
    });

    test('an edit outside the buffer throws and changes nothing', () => {
      const document = Document.create('abc');
      expect(() => document.commit([{ from: 2, to: 8, text: '' }], CursorSet.single(2))).toThrow(OutOfRangeError);
      expect(document.revision).toBe(0);
      expect(document.buffer.toString()).toBe('abc');
    });

    test('cursors past the new end are rejected', () => {
      const document = Document.create('abc');
      const batch = normalizeBatch([{ from: 0, to: 3, text: '' }]);
      expect(() => document.commit(batch, CursorSet.single(3))).toThrow(OutOfRangeError);
    });

    test('an empty batch only moves the cursors', () => {
      const document = Document.create('abc');
      const moved = document.commit([], CursorSet.single(2));
      expect(moved.revision).toBe(0);
      expect(moved.cursors.primaryCursor.head).toBe(2);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // History
  // ─────────────────────────────────────────────────────────────────────────

  describe('undo and redo', () => {
    test('undo restores text and cursors as a new revision', () => {
      const edited = insertAt(Document.create('hello world'), 5, 'x');
      const undone = edited.undo();
      expect(undone.buffer.toString()).toBe('hello world');
      expect(undone.revision).toBe(2);
      expect(undone.cursors.primaryCursor.head).toBe(0);
      expect(undone.isModified).toBe(false);

      const redone = undone.redo();
      expect(redone.buffer.toString()).toBe('hellox world');
      expect(redone.revision).toBe(3);
      expect(redone.cursors.primaryCursor.head).toBe(6);
    });

    test('a typing run undoes in one step', () => {
      let document = Document.create('hello world');
      document = insertAt(document, 5, 'x');
      document = insertAt(document, 6, 'y');
      expect(document.history.undoStack).toHaveLength(1);
      expect(document.undo().buffer.toString()).toBe('hello world');
    });

    test('moving the cursor ends the typing run', () => {
      let document = Document.create('hello world');
      document = insertAt(document, 5, 'x');
      document = document.withCursors(CursorSet.single(0));
      document = insertAt(document, 6, 'y');
      expect(document.history.undoStack).toHaveLength(2);
    });

    test('nothing to undo returns the same document', () => {
      const document = Document.create('abc');
      expect(document.undo()).toBe(document);
      expect(document.redo()).toBe(document);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Journal
  // ─────────────────────────────────────────────────────────────────────────

  describe('journal', () => {
    test('journalSince follows the chain from an older buffer', () => {
      const start = Document.create('abc');
      const one = insertAt(start, 0, 'x');
      const two = insertAt(one, 1, 'y');

      expect(two.journalSince(two.buffer)).toEqual([]);
      expect(two.journalSince(start.buffer)?.map(entry => entry.revision)).toEqual([1, 2]);
      expect(two.journalSince(one.buffer)?.map(entry => entry.revision)).toEqual([2]);
      expect(two.journalSince(TextBuffer.fromString('abc'))).toBeNull();
    });

    test('trimming the journal breaks the chain from old buffers', () => {
      const start = Document.create('abc', { journalLimit: 2 });
      let document = start;
      for (let i = 0; i < 3; i++) {
        document = document.withCursors(CursorSet.single(0));
        document = insertAt(document, 0, 'x');
      }
      expect(document.journal).toHaveLength(2);
      expect(document.journalSince(start.buffer)).toBeNull();
    });

    test('clearDirty only clears for the current revision', () => {
      const document = insertAt(Document.create('abc'), 0, 'x');
      expect(document.clearDirty(0)).toBe(document);
      expect(document.clearDirty(1).dirty).toBeNull();
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Files
  // ─────────────────────────────────────────────────────────────────────────

  describe('files', () => {
    test('detects line endings', () => {
      expect(detectLineEnding('a\nb')).toBe('lf');
      expect(detectLineEnding('a\r\nb')).toBe('crlf');
      expect(detectLineEnding('a\r\nb\nc')).toBe('mixed');
      expect(detectLineEnding('abc')).toBe('lf');
    });

    test('normalizes inserted line breaks for crlf documents', () => {
      expect(Document.create('a\r\nb').normalizeLineBreaks('x\ny\r\nz')).toBe('x\r\ny\r\nz');
      expect(Document.create('a\nb').normalizeLineBreaks('x\ny')).toBe('x\ny');
    });

    test('markSaved records the saved content and path', () => {
      const edited = insertAt(Document.create('abc'), 0, 'x');
      const saved = edited.markSaved(edited.buffer, '/tmp/file.txt');
      expect(saved.isModified).toBe(false);
      expect(saved.path).toBe('/tmp/file.txt');
    });
  });
});
