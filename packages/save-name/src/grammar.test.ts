import { describe, expect, it } from 'vitest';
import {
    lookAheadTail,
    matchBackup,
    matchEnd,
    matchInternalTag,
    matchLiteral,
    matchSaveName,
    matchSuffix,
    matchUserTag,
    matchVersion,
    optional,
} from './grammar';

describe('primitive matchers', () => {
    it('consumes a literal prefix', () => {
        expect(matchLiteral('user')('user1.dat')).toEqual({ ok: true, value: 'user', rest: '1.dat' });
    });

    it('reports the missing literal and the untouched input', () => {
        expect(matchLiteral('user')('save1.dat')).toEqual({ ok: false, rest: 'save1.dat', expected: 'user' });
    });

    it('turns a failure into absence with optional', () => {
        expect(optional(matchLiteral('.bak'))('.dat')).toEqual({ ok: true, value: undefined, rest: '.dat' });
    });

    it('matches only the end of input', () => {
        expect(matchEnd('')).toEqual({ ok: true, value: undefined, rest: '' });
        expect(matchEnd('x')).toEqual({ ok: false, rest: 'x', expected: 'end of input' });
    });
});

describe('matchInternalTag', () => {
    it('reads the text between double underscores', () => {
        expect(matchInternalTag('__some_attr__')).toEqual({ ok: true, value: 'some_attr', rest: '' });
        expect(matchInternalTag('__sometag__user2.dat')).toEqual({ ok: true, value: 'sometag', rest: 'user2.dat' });
        expect(matchInternalTag('__aa-bb_cc.dd__user')).toEqual({ ok: true, value: 'aa-bb_cc.dd', rest: 'user' });
    });

    it('stops at the first closing marker after a non-empty text', () => {
        expect(matchInternalTag('_____user1.dat')).toEqual({ ok: true, value: '_', rest: 'user1.dat' });
    });

    it('reports absence without an opening marker', () => {
        expect(matchInternalTag('user1.dat')).toEqual({ ok: true, value: undefined, rest: 'user1.dat' });
    });

    it('fails when the closing marker is missing', () => {
        expect(matchInternalTag('__pin')).toEqual({ ok: false, rest: 'pin', expected: '__' });
        expect(matchInternalTag('____user1.dat')).toEqual({ ok: false, rest: '__user1.dat', expected: '__' });
    });
});

describe('matchVersion', () => {
    it('accepts current and legacy version strings', () => {
        expect(matchVersion('_1.0.28891')).toEqual({ ok: true, value: '1.0.28891', rest: '' });
        expect(matchVersion('_1.2.3.28891.dat')).toEqual({ ok: true, value: '1.2.3.28891', rest: '.dat' });
    });

    it('leaves a dot without digits unconsumed', () => {
        expect(matchVersion('_1..2')).toEqual({ ok: true, value: '1', rest: '..2' });
    });

    it('reports absence instead of failing', () => {
        expect(matchVersion('.dat')).toEqual({ ok: true, value: undefined, rest: '.dat' });
        expect(matchVersion('_.dat')).toEqual({ ok: true, value: undefined, rest: '_.dat' });
    });
});

describe('matchBackup', () => {
    it('reads the backup id', () => {
        expect(matchBackup('.bak123')).toEqual({ ok: true, value: '123', rest: '' });
    });

    it('keeps an empty id distinct from absence', () => {
        expect(matchBackup('.bak')).toEqual({ ok: true, value: '', rest: '' });
        expect(matchBackup('')).toEqual({ ok: true, value: undefined, rest: '' });
    });

    it('requires the end of input after the id', () => {
        expect(matchBackup('.bak12x')).toEqual({ ok: true, value: undefined, rest: '.bak12x' });
    });
});

describe('matchSuffix', () => {
    it('parses the suffix with an optional backup id', () => {
        expect(matchSuffix('.dat')).toEqual({ ok: true, value: undefined, rest: '' });
        expect(matchSuffix('.dat.bak')).toEqual({ ok: true, value: '', rest: '' });
        expect(matchSuffix('.dat.bak123')).toEqual({ ok: true, value: '123', rest: '' });
    });

    it('fails without .dat', () => {
        expect(matchSuffix('err')).toEqual({ ok: false, rest: 'err', expected: '.dat' });
    });

    it('fails on trailing characters', () => {
        expect(matchSuffix('.dat.bak12x')).toEqual({ ok: false, rest: '.bak12x', expected: 'end of input' });
        expect(matchSuffix('.dat.dat')).toEqual({ ok: false, rest: '.dat', expected: 'end of input' });
    });
});

describe('lookAheadTail', () => {
    it('accepts a complete tail', () => {
        expect(lookAheadTail('_1.0.28891.dat')).toBe(true);
        expect(lookAheadTail('.dat.bak3')).toBe(true);
    });

    it('rejects partial tails', () => {
        expect(lookAheadTail('.dat.dat')).toBe(false);
        expect(lookAheadTail('_1.0')).toBe(false);
    });
});

describe('matchUserTag', () => {
    it('reads numerical tags', () => {
        expect(matchUserTag('user1.dat')).toEqual({ ok: true, value: '1', rest: '.dat' });
        expect(matchUserTag('user4_1.0.28891.dat')).toEqual({ ok: true, value: '4', rest: '_1.0.28891.dat' });
        expect(matchUserTag('user1.dat.bak')).toEqual({ ok: true, value: '1', rest: '.dat.bak' });
        expect(matchUserTag('user1.dat.bak123')).toEqual({ ok: true, value: '1', rest: '.dat.bak123' });
        expect(matchUserTag('user4_1.0.28891.dat.bak123')).toEqual({ ok: true, value: '4', rest: '_1.0.28891.dat.bak123' });
    });

    it('reads tags with separators', () => {
        expect(matchUserTag('userTest.dat')).toEqual({ ok: true, value: 'Test', rest: '.dat' });
        expect(matchUserTag('usera-b_c__d.e.dat')).toEqual({ ok: true, value: 'a-b_c__d.e', rest: '.dat' });
        expect(matchUserTag('usera-b_c__d.e_1.0.28891.dat')).toEqual({ ok: true, value: 'a-b_c__d.e', rest: '_1.0.28891.dat' });
        expect(matchUserTag('usera-b_c__d.e.dat.bak123')).toEqual({ ok: true, value: 'a-b_c__d.e', rest: '.dat.bak123' });
    });

    it('absorbs a .dat that is not followed by the end of input', () => {
        expect(matchUserTag('user1.dat.dat')).toEqual({ ok: true, value: '1.dat', rest: '.dat' });
    });

    it('takes at least one character', () => {
        expect(matchUserTag('user_1.dat')).toEqual({ ok: true, value: '_1', rest: '.dat' });
        expect(matchUserTag('user.dat')).toEqual({ ok: false, rest: '.dat', expected: 'version or .dat suffix' });
    });

    it('fails without a tail or prefix', () => {
        expect(matchUserTag('usersomething')).toEqual({ ok: false, rest: 'something', expected: 'version or .dat suffix' });
        expect(matchUserTag('save1.dat')).toEqual({ ok: false, rest: 'save1.dat', expected: 'user' });
    });
});

describe('matchSaveName', () => {
    it('decodes every field', () => {
        expect(matchSaveName('__pin__user4_1.0.28650.dat.bak13')).toEqual({
            ok: true,
            value: { internalTag: 'pin', tag: '4', version: '1.0.28650', backupId: '13' },
            rest: '',
        });
    });

    it('leaves absent fields undefined', () => {
        expect(matchSaveName('user1.dat')).toEqual({
            ok: true,
            value: { internalTag: undefined, tag: '1', version: undefined, backupId: undefined },
            rest: '',
        });
    });
});
