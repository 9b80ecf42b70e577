/**
 * Editor Commands
 *
 * Side effects the update step asks the runtime to perform. The editor
 * itself never touches the filesystem, the clipboard or timers.
 */

export type EditorCommand =
  | { type: 'scrollTo'; scrollTop: number }
  | { type: 'requestSave'; path: string | null; text: string; revision: number }
  | { type: 'requestLoad'; path: string }
  | { type: 'setClipboard'; text: string }
  /** Answer with a highlightTick for `revision` after `delayMs` */
  | { type: 'scheduleHighlight'; revision: number; delayMs: number };

export type CommandType = EditorCommand['type'];

export function scheduleHighlight(revision: number, delayMs: number): EditorCommand {
  return { type: 'scheduleHighlight', revision, delayMs };
}
