import { Prec, type Extension } from '@codemirror/state';
import { keymap, type KeyBinding } from '@codemirror/view';
import type { MenuKeymap } from '../types';
import type { ContextMenuController } from '../contextMenu';

export interface MenuKeymapConfig {
	controller: ContextMenuController;
	menuKeymap: MenuKeymap;
	/** Runs on accept while a menu is visible; the host applies the result. */
	onConfirm: (controller: ContextMenuController) => void;
}

/**
 * Key bindings for the menu's own navigation. Each command returns false
 * while no menu is visible, letting the editor's default binding run.
 */
export const buildMenuKeyBindings = (config: MenuKeymapConfig): KeyBinding[] => {
	const { controller, menuKeymap } = config;
	const bindings: KeyBinding[] = [];

	const addMenuBinding = (key: string | undefined, handler: () => boolean) => {
		const trimmed = key?.trim();
		if (!trimmed) return;
		bindings.push({ key: trimmed, run: () => handler() });
	};

	addMenuBinding(menuKeymap.first, () => controller.selectFirst());
	addMenuBinding(menuKeymap.prev, () => controller.selectPrev());
	addMenuBinding(menuKeymap.next, () => controller.selectNext());
	addMenuBinding(menuKeymap.last, () => controller.selectLast());
	addMenuBinding(menuKeymap.accept, () => {
		if (!controller.visible()) return false;
		config.onConfirm(controller);
		return true;
	});
	addMenuBinding(menuKeymap.dismiss, () => controller.dismiss());

	return bindings;
};

export const buildMenuKeymapExtension = (config: MenuKeymapConfig): Extension =>
	Prec.highest(keymap.of(buildMenuKeyBindings(config)));
