import { DEFAULT_SETTINGS, ensureMenuSettings } from '../src/config/defaults';
import type { MenuSettings } from '../src/types';

describe('ensureMenuSettings', () => {
	it('returns the defaults without input', () => {
		expect(ensureMenuSettings()).toEqual(DEFAULT_SETTINGS);
	});

	it('does not share the default keymap object', () => {
		const settings = ensureMenuSettings();
		settings.menuKeymap.accept = 'Tab';
		expect(DEFAULT_SETTINGS.menuKeymap.accept).toBe('Enter');
	});

	it('keeps valid overrides', () => {
		const settings = ensureMenuSettings({
			sortCompletions: false,
			resolveCompletions: false,
			resultLimit: 20,
			enableDebugLogs: true,
			debugCategories: ['resolve', 'matcher'],
			menuKeymap: { ...DEFAULT_SETTINGS.menuKeymap, accept: ' Tab ' },
		});

		expect(settings.sortCompletions).toBe(false);
		expect(settings.showCompletionDocumentation).toBe(true);
		expect(settings.resolveCompletions).toBe(false);
		expect(settings.resultLimit).toBe(20);
		expect(settings.enableDebugLogs).toBe(true);
		expect(settings.debugCategories).toEqual(['resolve', 'matcher']);
		expect(settings.menuKeymap.accept).toBe('Tab');
	});

	it('falls back for invalid limits and blank keys', () => {
		const settings = ensureMenuSettings({
			resultLimit: 0,
			menuKeymap: { ...DEFAULT_SETTINGS.menuKeymap, dismiss: '   ' },
		});
		expect(settings.resultLimit).toBe(100);
		expect(settings.menuKeymap.dismiss).toBe('Escape');
		expect(ensureMenuSettings({ resultLimit: 2.5 }).resultLimit).toBe(100);
	});

	it('drops unknown and repeated debug categories', () => {
		const raw: Partial<MenuSettings> = JSON.parse(
			'{"debugCategories": ["menu", "bogus", "menu", 4]}'
		);
		expect(ensureMenuSettings(raw).debugCategories).toEqual(['menu']);
	});
});
