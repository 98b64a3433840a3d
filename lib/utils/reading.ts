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

import { digitGroupToWords } from './numbers';
import { letterName, symbolName } from './spelling';
import { lookupPronunciation, romanize, transliterateWord } from './transliterate';
import { toAsciiDigits } from '../tokenizer/helpers';

/**
 * Read a Latin letter by letter name.
 */
export function spellLetters(word : string) : string {
    return Array.from(word, (c) => letterName(c) ?? '').filter((name) => name !== '').join(' ');
}

export function isAcronym(word : string) : boolean {
    return /^[A-Z]{2,5}$/.test(word);
}

/**
 * Read a foreign word: known words from the lexicon, acronyms and words
 * without vowels letter by letter, anything else by spelling rules.
 */
export function readForeignWord(word : string) : string {
    const known = lookupPronunciation(word);
    if (known !== undefined)
        return known;

    const latin = romanize(word);
    if (word.length === 1 || isAcronym(word) || !/[aeiouyêîû]/.test(latin))
        return spellLetters(latin);
    return transliterateWord(word);
}

/**
 * Read an address, handle or code piece by piece: words, digit groups and
 * the symbols that separate them.
 */
export function readCode(text : string) : string {
    const words : string[] = [];
    const re = /([a-z\u00c0-\u024f\u0370-\u03ff\u0400-\u04ff]+)|([0-9]+)|([\u0600-\u06ff]+)|(.)/giu;
    let match : RegExpExecArray|null;
    const source = toAsciiDigits(text);
    while ((match = re.exec(source)) !== null) {
        if (match[1] !== undefined) {
            words.push(readForeignWord(match[1]));
        } else if (match[2] !== undefined) {
            words.push(digitGroupToWords(match[2]));
        } else if (match[3] !== undefined) {
            words.push(match[3]);
        } else {
            const name = symbolName(match[4]);
            if (name !== undefined)
                words.push(name);
        }
    }
    return words.filter((w) => w !== '').join(' ');
}
