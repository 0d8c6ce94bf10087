import { CompletionStore, filterText } from '../src/completionStore';
import { MenuIndexError } from '../src/utils/errorUtils';
import { createCompletion } from './mocks/completions';

describe('CompletionStore', () => {
	it('replaces a single slot without changing the length', () => {
		const store = new CompletionStore([createCompletion('one'), createCompletion('two')]);

		store.replace(1, createCompletion('deux'));

		expect(store.length).toBe(2);
		expect(store.toArray().map((completion) => completion.label.text)).toEqual(['one', 'deux']);
	});

	it('rejects indices outside the store', () => {
		const store = new CompletionStore([createCompletion('one')]);

		expect(() => store.replace(1, createCompletion('two'))).toThrow(MenuIndexError);
		expect(() => store.replace(-1, createCompletion('two'))).toThrow(
			'Menu index -1 out of range (length 1)'
		);
		expect(() => store.applyResolved(3, {})).toThrow(MenuIndexError);
	});

	it('does not alias the source array', () => {
		const source = [createCompletion('one')];
		const store = new CompletionStore(source);

		store.replace(0, createCompletion('uno'));

		expect(source[0]?.label.text).toBe('one');
	});

	it('reports whether a resolve changed anything visible', () => {
		const store = new CompletionStore([
			createCompletion('one'),
			createCompletion('two', { documentation: { kind: 'singleLine', text: 'fn two()' } }),
		]);

		expect(
			store.applyResolved(0, { documentation: { kind: 'singleLine', text: 'fn one()' } })
		).toBe(true);
		expect(
			store.applyResolved(1, { documentation: { kind: 'singleLine', text: 'fn two()' } })
		).toBe(false);
		expect(store.get(0)?.resolved).toBe(true);
		expect(store.get(1)?.resolved).toBe(true);
	});

	it('iterates in slot order', () => {
		const store = new CompletionStore([createCompletion('a'), createCompletion('b')]);
		expect([...store].map((completion) => completion.newText)).toEqual(['a', 'b']);
	});
});

describe('filterText', () => {
	it('uses the filter range of the label', () => {
		expect(
			filterText(
				createCompletion('fn render()', { label: { text: 'fn render()', filterRange: { start: 3, end: 9 } } })
			)
		).toBe('render');
	});

	it('falls back to the whole label for a missing or empty range', () => {
		expect(filterText(createCompletion('value'))).toBe('value');
		expect(
			filterText(createCompletion('value', { label: { text: 'value', filterRange: { start: 2, end: 2 } } }))
		).toBe('value');
	});
});
