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

// Kurdish grammatical suffixes that can follow a number, a time or a unit
// written in digits or Latin letters, e.g. "12:30 PMـە" or "10km/hـە"
//
// this is a closed list: a word is only treated as a suffix if it matches
// one of these entries exactly
export const GRAMMAR_SUFFIXES : readonly string[] = [
    'ە', 'یە', 'ی', 'یی', 'یش', 'ش', 'یشە',
    'ەکە', 'ەکان', 'ەکەی', 'ەکانی', 'ەکەم', 'ەکانم',
    'ان', 'یان', 'مان', 'تان', 'م', 'ت', 'مە', 'تە',
    'ین', 'ن', 'ەوە', 'وە', 'دا', 'ەدا', 'یدا',
    'ێک', 'یەک', 'ێکی', 'یەکی', 'ەم', 'ەمین', 'یەم', 'یەمین',
].slice().sort((a, b) => b.length - a.length);

export const KURDISH_VOWELS : readonly string[] = ['وو', 'و', 'ی', 'ێ', 'ا', 'ە', 'ۆ'];

export const TATWEEL = 'ـ';
export const ZWNJ = '\u200c';

export function isGrammarSuffix(text : string) : boolean {
    return GRAMMAR_SUFFIXES.includes(text);
}

export function endsWithVowel(text : string) : boolean {
    return KURDISH_VOWELS.some((vowel) => text.endsWith(vowel));
}

// the suffixes that take a linking "ی" after a vowel
const LINKED_SUFFIXES : readonly string[] = ['ە', 'ەکە', 'ەکان'];

/**
 * Attach a grammatical suffix to a spoken phrase.
 *
 * "ە", "ەکە" and "ەکان" take a linking "ی" after a vowel:
 * "نیوەڕۆ" + "ە" is "نیوەڕۆیە".
 */
export function appendSuffix(text : string, suffix : string) : string {
    text = text.trim();
    if (!suffix)
        return text;
    if (LINKED_SUFFIXES.includes(suffix) && endsWithVowel(text))
        return text + 'ی' + suffix;
    return text + suffix;
}

/**
 * Split a token such as "hـە" or "PMەکە" into the foreign or numeric base
 * and the Kurdish suffix attached to it.
 *
 * The suffix is recognized after a tatweel, or as the trailing run of
 * Arabic-script letters after a Latin base. Returns the whole text as
 * base and an empty suffix if there is no valid suffix.
 */
export function splitSuffix(text : string) : [string, string] {
    const tatweel = text.indexOf(TATWEEL);
    if (tatweel > 0) {
        const suffix = text.substring(tatweel).replace(/[ـ\u200c]/g, '');
        if (suffix === '' || isGrammarSuffix(suffix))
            return [text.substring(0, tatweel), suffix];
        return [text, ''];
    }

    const match = /^([^\u0600-\u06ff]+)([\u0600-\u06ff]+)$/.exec(text);
    if (match !== null && isGrammarSuffix(match[2]))
        return [match[1], match[2]];
    return [text, ''];
}
