import { describe, it, expect } from 'vitest';
import { applySettings, configSection, defaultSettings } from '../src/settings';

describe('server settings', () => {
	it('starts from the defaults', () => {
		expect(defaultSettings()).toEqual({
			cmakePath: 'cmake',
			namesCachePath: '',
			logFile: '',
			debug: false,
			format: { enabled: true, maxBlankLines: 3, maxArgumentBlankLines: 1 },
			parser: { bracketMatching: 'strict' },
		});
	});

	it('merges user settings and reports changes', () => {
		const s = defaultSettings();
		const raw = { cmakePath: '/opt/cmake/bin/cmake', format: { enabled: false, maxBlankLines: 2 }, parser: { bracketMatching: 'loose' } };
		expect(applySettings(s, raw)).toBe(true);
		expect(s.cmakePath).toBe('/opt/cmake/bin/cmake');
		expect(s.format).toEqual({ enabled: false, maxBlankLines: 2, maxArgumentBlankLines: 1 });
		expect(s.parser.bracketMatching).toBe('loose');
		expect(applySettings(s, raw)).toBe(false);
	});

	it('ignores values of the wrong type', () => {
		const s = defaultSettings();
		expect(applySettings(s, { debug: 'yes', format: { maxBlankLines: -1 }, parser: { bracketMatching: 'fuzzy' } })).toBe(false);
		expect(applySettings(s, undefined)).toBe(false);
		expect(s).toEqual(defaultSettings());
	});

	it('falls back to cmake on an empty path', () => {
		const s = defaultSettings();
		applySettings(s, { cmakePath: '/usr/bin/cmake' });
		applySettings(s, { cmakePath: '' });
		expect(s.cmakePath).toBe('cmake');
	});

	it('picks the configuration section', () => {
		expect(configSection({ cmake: { debug: true } }, 'cmake')).toEqual({ debug: true });
		expect(configSection(null, 'cmake')).toBeUndefined();
	});

	it('does not share state with the format defaults', () => {
		const a = defaultSettings();
		a.format.maxBlankLines = 0;
		expect(defaultSettings().format.maxBlankLines).toBe(3);
	});
});
