import type { ChangeDesc, EditorState } from "@codemirror/state";

/**
 * Map a menu anchor through a document change. Text inserted exactly at
 * the anchor lands after it, so the anchor keeps marking the query start.
 */
export const mapAnchor = (anchor: number, changes: ChangeDesc): number =>
	changes.mapPos(anchor, -1);

/**
 * Text typed since the menu opened: the range between `anchor` and the
 * main cursor. Null when the cursor left that range (moved before the
 * anchor, onto another line, or extended a selection), which means the
 * menu should close.
 */
export const getCompletionQuery = (
	state: EditorState,
	anchor: number
): string | null => {
	const { main } = state.selection;
	if (!main.empty || main.head < anchor || anchor > state.doc.length) {
		return null;
	}
	const anchorLine = state.doc.lineAt(anchor);
	if (main.head > anchorLine.to) {
		return null;
	}
	return state.sliceDoc(anchor, main.head);
};
