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

import romanization from '../data/romanization.json';
import englishLexicon from '../data/english-lexicon.json';

const CYRILLIC : Record<string, string> = romanization.cyrillic;
const GREEK : Record<string, string> = romanization.greek;
const LEXICON = new Map<string, string>(Object.entries(englishLexicon));

// multi-letter spellings, tried before single letters, longest first
const DIGRAPHS : Array<[string, string]> = [
    ['tch', 'چ'], ['sch', 'ش'],
    ['sh', 'ش'], ['ch', 'چ'], ['kh', 'خ'], ['gh', 'غ'], ['zh', 'ژ'],
    ['th', 'ت'], ['ph', 'ف'], ['ck', 'ک'], ['qu', 'کو'], ['oo', 'وو'],
    ['ee', 'ی'], ['ou', 'و'], ['ai', 'ەی'], ['ay', 'ەی'], ['ei', 'ەی'],
    ['ey', 'ەی'], ['oa', 'ۆ'],
];

const LETTERS : Record<string, string> = {
    a: 'ا', b: 'ب', c: 'ک', d: 'د', e: 'ە', f: 'ف', g: 'گ', h: 'ھ',
    i: 'ی', j: 'ج', k: 'ک', l: 'ل', m: 'م', n: 'ن', o: 'ۆ', p: 'پ',
    q: 'ک', r: 'ر', s: 'س', t: 'ت', u: 'و', v: 'ڤ', w: 'و', x: 'کس',
    y: 'ی', z: 'ز',
    // Kurdish in the Latin alphabet
    'ê': 'ێ', 'î': 'ی', 'û': 'وو', 'ç': 'چ', 'ş': 'ش',
};

// vowels at the start of a word are carried by a hamza
const INITIAL_VOWELS : Record<string, string> = {
    a: 'ئا', e: 'ئە', i: 'ئی', o: 'ئۆ', u: 'ئو',
    'ê': 'ئێ', 'î': 'ئی', 'û': 'ئوو',
};

const VOWELS = 'aeiouêîû';

function has(table : Record<string, string>, key : string) : boolean {
    return Object.prototype.hasOwnProperty.call(table, key);
}

/**
 * Convert Cyrillic and Greek letters to Latin, drop the accents the Kurdish
 * rules do not know about, and lowercase.
 */
export function romanize(word : string) : string {
    let out = '';
    for (const char of word.toLowerCase()) {
        if (has(CYRILLIC, char))
            out += CYRILLIC[char];
        else if (has(GREEK, char))
            out += GREEK[char];
        else if (has(LETTERS, char))
            out += char;
        else if (char === 'ß')
            out += 'ss';
        else if (char === 'æ')
            out += 'ae';
        else if (char === 'œ')
            out += 'oe';
        else if (char === 'ø')
            out += 'o';
        else
            out += char.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
    }
    return out;
}

/**
 * Write a foreign word in the Kurdish alphabet, by spelling rules.
 */
export function transliterateWord(word : string) : string {
    const latin = romanize(word);

    let out = '';
    let i = 0;
    while (i < latin.length) {
        const char = latin[i];
        const digraph = DIGRAPHS.find(([from]) => latin.startsWith(from, i));
        if (digraph !== undefined) {
            const [from, to] = digraph;
            out += (i === 0 && VOWELS.includes(from[0]) ? 'ئ' : '') + to;
            i += from.length;
            continue;
        }

        // doubled consonants are pronounced once
        if (i > 0 && char === latin[i-1] && !VOWELS.includes(char)) {
            i++;
            continue;
        }
        // a final "e" after a consonant is silent: "drive", "code"
        if (char === 'e' && i === latin.length - 1 && i >= 3 && !VOWELS.includes(latin[i-1])) {
            i++;
            continue;
        }

        if (i === 0 && has(INITIAL_VOWELS, char))
            out += INITIAL_VOWELS[char];
        else if (i === 0 && char === 'r')
            out += 'ڕ';
        else if (has(LETTERS, char))
            out += LETTERS[char];
        i++;
    }
    return out;
}

export function lookupPronunciation(word : string) : string|undefined {
    return LEXICON.get(word.toLowerCase());
}
