import { splitWords } from '../src/utils/wordSplitter';

describe('splitWords', () => {
	it('splits camel and pascal case at lower-to-upper transitions', () => {
		expect(splitWords('HelloWorld')).toEqual(['Hello', 'World']);
		expect(splitWords('createComponent')).toEqual(['create', 'Component']);
	});

	it('keeps separators attached to the preceding word', () => {
		expect(splitWords('create_all')).toEqual(['create_', 'all']);
		expect(splitWords('foo.bar()')).toEqual(['foo.', 'bar()']);
	});

	it('keeps a leading underscore on the word it prefixes', () => {
		expect(splitWords('_hello_world_')).toEqual(['_hello_', 'world_']);
		expect(splitWords('__init__')).toEqual(['__init__']);
	});

	it('does not split runs of capitals', () => {
		expect(splitWords('CONSTANT_NAME')).toEqual(['CONSTANT_', 'NAME']);
		expect(splitWords('getHTTPResponse')).toEqual(['get', 'HTTPResponse']);
	});

	it('treats digits as part of a word', () => {
		expect(splitWords('vec3Length')).toEqual(['vec3', 'Length']);
	});

	it('returns nothing for an empty string', () => {
		expect(splitWords('')).toEqual([]);
	});
});
