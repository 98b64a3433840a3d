// -*- mode: typescript; indent-tabs-mode: nil; js-basic-offset: 4 -*-
//
// This file is part of Genie
//
// Copyright 2020 The Board of Trustees of the Leland Stanford Junior University
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//    http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.
//
// Author: Giovanni Campagna <gcampagn@cs.stanford.edu>

import { Token, TokenType } from '../tokenizer/token';
import { NormalizationConfig, ShaddaMode } from '../config';
import { BaseModule } from './base';

const FATHA = '\u064e';
const DAMMA = '\u064f';
const KASRA = '\u0650';
const FATHATAN = '\u064b';
const DAMMATAN = '\u064c';
const KASRATAN = '\u064d';
const SHADDA = '\u0651';
const SUPERSCRIPT_ALEF = '\u0670';
const MADDAH = '\u0653';
// small high rounded zero and small high upright rectangular zero: the letter is not pronounced
const SILENT_MARKS = ['\u06df', '\u06e0'];

const ALEF = 'ا';
const ALEF_WASLA = 'ٱ';
const ALEF_MADDA = 'آ';
const ALEF_MAKSURA = 'ى';
const HAMZA_CARRIERS = ['أ', 'إ', 'ؤ', 'ئ', 'ء'];
const LAM = 'ل';
const RA = 'ر';
const NOON = 'ن';
const BEH = 'ب';
const WAW = 'و';
const YEH = ['ي', 'ی'];
const HEH = 'ه';
const TEH_MARBUTA = 'ة';

// the lam of the article is assimilated into these
const SUN_LETTERS = new Set(['ت', 'ث', 'د', 'ذ', 'ر', 'ز', 'س', 'ش', 'ص', 'ض', 'ط', 'ظ', 'ل', 'ن']);
// a silent ra before these is heavy
const HEAVY_LETTERS = new Set(['خ', 'ص', 'ض', 'غ', 'ط', 'ق', 'ظ']);

// letters without a Kurdish counterpart
const LETTER_MAP : Readonly<Record<string, string>> = {
    'ث': 'س', 'ذ': 'ز', 'ص': 'س', 'ض': 'ز', 'ط': 'ت', 'ظ': 'ز',
    'ي': 'ی', 'ك': 'ک', 'ه': 'ھ', 'ى': 'ا',
};

// harakat and Quranic annotation marks, and tatweel
const MARK_RE = /[\u064b-\u065f\u0670\u06d6-\u06ed]/;
const ALL_MARKS_RE = /[\u064b-\u065f\u0670\u06d6-\u06ed\u0640]/g;
// a token is vocalized if it carries one of these
const VOWEL_MARK_RE = /[\u064b-\u0652\u0670]/;

type Vowel = 'a'|'i'|'u';
/**
 * The last sound of a word: a short vowel, or "none" after a consonant.
 * Null stands for the start of an utterance.
 */
export type FinalSound = Vowel|'none'|null;

interface Unit {
    letter : string;
    marks : string[];
}

export interface Reading {
    text : string;
    final : FinalSound;
    // the final nun was merged into the first letter of the next word
    mergesIntoNext : boolean;
}

const VOWEL_TEXT : Record<Vowel, string> = { a: 'ە', i: 'ی', u: 'و' };

function splitUnits(word : string) : Unit[] {
    const units : Unit[] = [];
    for (const char of word.replace(/ـ/g, '')) {
        if (MARK_RE.test(char)) {
            if (units.length > 0)
                units[units.length-1].marks.push(char);
        } else {
            units.push({ letter: char, marks: [] });
        }
    }
    return units;
}

function shortVowel(unit : Unit) : Vowel|null {
    if (unit.marks.includes(FATHA))
        return 'a';
    if (unit.marks.includes(KASRA))
        return 'i';
    if (unit.marks.includes(DAMMA))
        return 'u';
    return null;
}

function tanween(unit : Unit) : Vowel|null {
    if (unit.marks.includes(FATHATAN))
        return 'a';
    if (unit.marks.includes(KASRATAN))
        return 'i';
    if (unit.marks.includes(DAMMATAN))
        return 'u';
    return null;
}

function isBare(unit : Unit|undefined) : boolean {
    return unit !== undefined && shortVowel(unit) === null && tanween(unit) === null;
}

function mapLetter(letter : string) : string {
    return Object.prototype.hasOwnProperty.call(LETTER_MAP, letter) ? LETTER_MAP[letter] : letter;
}

/**
 * Strip harakat, Quranic marks and tatweel.
 */
export function removeDiacritics(word : string) : string {
    return word.replace(ALL_MARKS_RE, '').replace(/ٱ/g, ALEF);
}

export function isVocalized(word : string) : boolean {
    return VOWEL_MARK_RE.test(word);
}

/**
 * Reads one vocalized word into Kurdish spelling.
 */
class WordReader {
    private readonly _units : Unit[];
    private readonly _shadda : ShaddaMode;
    private _out = '';
    private _last : FinalSound;
    private _mergesIntoNext = false;

    constructor(units : Unit[], previous : FinalSound, shadda : ShaddaMode, geminate : boolean) {
        this._units = units;
        this._last = previous;
        this._shadda = shadda;
        // a nun merged into this word doubles its first letter, as a shadda would
        if (geminate && units.length > 0 && !units[0].marks.includes(SHADDA))
            units[0].marks.push(SHADDA);
    }

    read(nextLetter : string|undefined) : Reading {
        const allah = this._findAllah();
        this._readUnits(0, allah < 0 ? this._units.length : allah);
        if (allah >= 0)
            this._readAllah(allah);
        this._assimilateFinalNoon(nextLetter);
        return { text: this._out, final: this._last, mergesIntoNext: this._mergesIntoNext };
    }

    // the index where the name of God starts ("ٱللَّه", "لِلَّهِ", "وَٱللَّهُ"), or -1
    private _findAllah() : number {
        const letters = this._units.map((u) => u.letter);
        const n = letters.length;
        if (n < 3 || letters[n-3] !== LAM || letters[n-2] !== LAM || letters[n-1] !== HEH)
            return -1;
        // a vowel on the first lam makes it the preposition "li-"
        if (!isBare(this._units[n-3]))
            return n-2;
        if (n >= 4 && [ALEF, ALEF_WASLA].includes(letters[n-4]))
            return n-4;
        return n-3;
    }

    private _readAllah(start : number) : void {
        const atStart = start === 0 && this._last === null;
        if (atStart)
            this._out += 'ئە';
        // heavy after a, u and at the start of an utterance; light after i or a consonant
        const heavy = atStart || this._last === 'a' || this._last === 'u' || this._last === null;
        this._out += heavy ? 'ڵڵا' : 'للا';
        this._out += 'ھ';

        const heh = this._units[this._units.length-1];
        const vowel = shortVowel(heh);
        if (vowel !== null) {
            this._out += VOWEL_TEXT[vowel];
            this._last = vowel;
        } else {
            this._last = 'none';
        }
    }

    private _isArticleLam(i : number) : boolean {
        const alef = i - 1;
        return alef >= 0 && alef <= 1 && [ALEF, ALEF_WASLA].includes(this._units[alef].letter)
            && isBare(this._units[i]) && !this._units[i].marks.includes(SHADDA);
    }

    private _readRa(unit : Unit, next : Unit|undefined) : string {
        const vowel = shortVowel(unit) ?? tanween(unit);
        if (vowel === 'a' || vowel === 'u')
            return 'ڕ';
        if (vowel === 'i')
            return 'ر';
        if (this._last === 'a' || this._last === 'u')
            return 'ڕ';
        if (next !== undefined && HEAVY_LETTERS.has(next.letter))
            return 'ڕ';
        return 'ر';
    }

    private _readUnits(from : number, to : number) : void {
        for (let i = from; i < to; i++) {
            const unit = this._units[i];
            const next = i + 1 < to ? this._units[i+1] : undefined;
            if (unit.marks.some((m) => SILENT_MARKS.includes(m)))
                continue;

            const vowel = shortVowel(unit);
            const nunation = tanween(unit);

            if (unit.letter === ALEF_WASLA || (unit.letter === ALEF && i === 0 && next?.letter === LAM && isBare(unit))) {
                // the connecting alef is only pronounced at the start of an utterance
                if (i === 0 && this._last === null) {
                    this._out += 'ئە';
                    this._last = 'a';
                }
                continue;
            }
            if (unit.letter === ALEF_MADDA || (unit.letter === ALEF && unit.marks.includes(MADDAH))) {
                this._out += 'ئا';
                this._last = 'a';
                continue;
            }
            if (HAMZA_CARRIERS.includes(unit.letter)) {
                this._out += 'ئ';
                this._readVowel(unit, vowel, nunation, next);
                if (this._skipLongVowel(vowel, next))
                    i++;
                continue;
            }
            if (unit.letter === ALEF || unit.letter === ALEF_MAKSURA) {
                if (nunation === 'a') {
                    this._out += 'ەن';
                    this._last = 'none';
                } else {
                    this._out += i === 0 ? 'ئا' : 'ا';
                    this._last = 'a';
                }
                continue;
            }
            // the article before a sun letter: the lam is silent and the next letter doubles
            if (unit.letter === LAM && next !== undefined && SUN_LETTERS.has(next.letter) && this._isArticleLam(i))
                continue;

            let consonant : string;
            if (unit.letter === RA)
                consonant = this._readRa(unit, next);
            else if (unit.letter === TEH_MARBUTA)
                consonant = vowel !== null || nunation !== null ? 'ت' : 'ە';
            else if (unit.letter === NOON && vowel === null && nunation === null && !unit.marks.includes(SHADDA) && next?.letter === BEH)
                consonant = 'م';
            else
                consonant = mapLetter(unit.letter);

            this._out += unit.marks.includes(SHADDA) && this._shadda === 'double' ? consonant + consonant : consonant;
            if (unit.letter === TEH_MARBUTA && consonant === 'ە') {
                this._last = 'a';
                continue;
            }
            this._readVowel(unit, vowel, nunation, next);
            if (this._skipLongVowel(vowel, next))
                i++;
        }
    }

    private _readVowel(unit : Unit, vowel : Vowel|null, nunation : Vowel|null, next : Unit|undefined) : void {
        if (unit.marks.includes(SUPERSCRIPT_ALEF)) {
            this._out += 'ا';
            this._last = 'a';
        } else if (vowel === 'a' && next?.letter === ALEF && isBare(next)) {
            this._out += 'ا';
            this._last = 'a';
        } else if (vowel === 'i' && next !== undefined && YEH.includes(next.letter) && isBare(next)) {
            this._out += 'ی';
            this._last = 'i';
        } else if (vowel === 'u' && next?.letter === WAW && isBare(next)) {
            this._out += 'وو';
            this._last = 'u';
        } else if (nunation !== null) {
            this._out += VOWEL_TEXT[nunation] + 'ن';
            this._last = 'none';
        } else if (vowel !== null) {
            this._out += VOWEL_TEXT[vowel];
            this._last = vowel;
        } else {
            this._last = 'none';
        }
    }

    // a long vowel is written with a following letter, which is consumed with it
    private _skipLongVowel(vowel : Vowel|null, next : Unit|undefined) : boolean {
        if (next === undefined || !isBare(next) || next.marks.includes(SHADDA))
            return false;
        return (vowel === 'a' && next.letter === ALEF)
            || (vowel === 'i' && YEH.includes(next.letter))
            || (vowel === 'u' && next.letter === WAW);
    }

    // a final nun or nunation before ب is read م, before ي and و it merges into them
    private _assimilateFinalNoon(nextLetter : string|undefined) : void {
        if (nextLetter === undefined || !this._out.endsWith('ن') || this._last !== 'none')
            return;
        if (nextLetter === BEH) {
            this._out = this._out.slice(0, -1) + 'م';
        } else if (nextLetter === WAW || YEH.includes(nextLetter)) {
            this._out = this._out.slice(0, -1);
            this._mergesIntoNext = true;
        }
    }
}

/**
 * Read a vocalized Arabic word in Kurdish spelling.
 *
 * `previous` is the last sound of the preceding word, and `nextLetter` the
 * first letter of the following one, for the rules that cross word boundaries.
 * `geminate` is set when the preceding word's final nun merged into this one.
 */
export function readVocalized(word : string, previous : FinalSound, nextLetter : string|undefined,
                              shadda : ShaddaMode, geminate = false) : Reading {
    return new WordReader(splitUnits(word), previous, shadda, geminate).read(nextLetter);
}

/**
 * Convert vocalized Arabic text, such as Quranic verses, to Kurdish spelling.
 *
 * Words are read in a single left to right pass, which carries the last sound
 * of each word into the next: the name of God and the connecting alef depend
 * on it.
 */
export default class DiacriticsNormalizer extends BaseModule {
    readonly name = 'DiacriticsNormalizer';
    readonly priority = 40;

    constructor(config : NormalizationConfig) {
        super(config, 'diacritics');
    }

    process(tokens : Token[]) : Token[] {
        const mode = this._config.diacriticsMode;
        if (mode === 'keep')
            return tokens;

        let previous : FinalSound = null;
        let merged = false;
        tokens.forEach((token, i) => {
            const geminate = merged;
            merged = false;
            if (token.type !== TokenType.WORD || token.isConverted) {
                // punctuation ends the utterance
                if (token.type === TokenType.SYMBOL)
                    previous = null;
                return;
            }

            if (mode === 'remove') {
                if (MARK_RE.test(token.text))
                    this._replace(token, removeDiacritics(token.text));
                return;
            }

            if (!isVocalized(token.text)) {
                // a token made only of pause marks
                if (MARK_RE.test(token.text) && removeDiacritics(token.text) === '') {
                    token.consume();
                    previous = null;
                }
                return;
            }

            const reading = readVocalized(token.text, previous, this._nextLetter(tokens, i), this._config.shaddaMode, geminate);
            this._replace(token, reading.text);
            previous = /[\r\n]/.test(token.whitespaceAfter) ? null : reading.final;
            merged = reading.mergesIntoNext;
        });
        return this._compact(tokens);
    }

    private _replace(token : Token, text : string) : void {
        if (text === '')
            token.consume();
        else
            token.convert(text);
    }

    private _nextLetter(tokens : Token[], i : number) : string|undefined {
        if (/[\r\n]/.test(tokens[i].whitespaceAfter))
            return undefined;
        const next = this._next(tokens, i);
        if (next === undefined || next.type !== TokenType.WORD)
            return undefined;
        const letters = next.text.replace(ALL_MARKS_RE, '');
        return letters.length > 0 ? letters[0] : undefined;
    }
}
