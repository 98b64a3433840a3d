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

import { integerToWords, intToKurdish } from '../utils/numbers';
import { appendSuffix, isGrammarSuffix } from '../utils/suffixes';
import { Tag, Token, TokenType } from '../tokenizer/token';
import { toAsciiDigits } from '../tokenizer/helpers';
import { NormalizationConfig } from '../config';
import { BaseModule } from './base';

const MONTHS = [
    'کانونی دووەم', 'شوبات', 'ئازار', 'نیسان', 'ئایار', 'حوزەیران',
    'تەمموز', 'ئاب', 'ئەیلوول', 'تشرینی یەکەم', 'تشرینی دووەم', 'کانونی یەکەم'
];

const AM_MARKERS = ['AM', 'A.M.', 'پ.ن', 'بەیانی', 'پێش نیوەڕۆ', 'پێشنیوەڕۆ'];
const PM_MARKERS = [
    'PM', 'P.M.', 'د.ن',
    'دوای نیوەڕۆ', 'دوای نیوەرۆ', 'دوا نیوەڕۆ',
    'پاش نیوەڕۆ', 'پاش نیوەرۆ', 'پاشنیوەڕۆ',
    'ئێوارە', 'عەسر', 'نیوەڕۆ'
];
// "at night" is AM or PM depending on the hour
const NIGHT_MARKER = 'شەو';

export type Meridiem = 'am'|'pm'|'night';

interface Marker {
    key : string;
    meridiem : Meridiem;
}

// markers are compared without spaces, dots, tatweel and zero-width non-joiners,
// longest first so that "پێشنیوەڕۆ" is not matched as "نیوەڕۆ"
function markerKey(text : string) : string {
    return text.replace(/[\s.ـ\u200c]/g, '').toUpperCase();
}
const MARKERS : Marker[] = ([
    ...AM_MARKERS.map((m) : Marker => ({ key: markerKey(m), meridiem: 'am' })),
    ...PM_MARKERS.map((m) : Marker => ({ key: markerKey(m), meridiem: 'pm' })),
    { key: markerKey(NIGHT_MARKER), meridiem: 'night' },
] satisfies Marker[]).sort((a, b) => b.key.length - a.key.length);

// the longest number of tokens a time marker can span
const MARKER_WINDOW = 3;

interface MarkerMatch {
    meridiem : Meridiem;
    suffix : string;
    length : number;
}

/**
 * Split a cleaned phrase into a time marker and a grammatical suffix.
 */
export function matchMarker(phrase : string) : { meridiem : Meridiem, suffix : string }|null {
    let clean = phrase.replace(/\s/g, '');
    // a linking "ی" between the time and the marker: "12:30ی ئێوارە"
    if (clean.length > 1 && (clean[0] === 'ی' || clean[0] === 'ي'))
        clean = clean.substring(1);
    clean = clean.replace(/[.ـ\u200c]/g, '');
    const upper = clean.toUpperCase();

    for (const marker of MARKERS) {
        if (!upper.startsWith(marker.key))
            continue;
        const suffix = clean.substring(marker.key.length);
        if (suffix !== '' && !isGrammarSuffix(suffix))
            continue;
        return { meridiem: marker.meridiem, suffix };
    }
    return null;
}

/**
 * The name of the part of the day, for an hour on the 24-hour clock.
 */
export function timePeriod(hour : number) : string {
    if (hour < 1)
        return 'نیوەشەو';
    if (hour < 4)
        return 'شەو';
    if (hour < 6)
        return 'بەرەبەیان';
    if (hour < 10)
        return 'بەیانی';
    if (hour < 12)
        return 'پێش نیوەڕۆ';
    if (hour < 14)
        return 'نیوەڕۆ';
    if (hour < 18)
        return 'دوای نیوەڕۆ';
    if (hour < 21)
        return 'ئێوارە';
    return 'شەو';
}

/**
 * Read a numeric date in words, or return null if it is not a valid date.
 *
 * A four digit first field is the year (year-month-day). Otherwise the last
 * field is the year, and of the other two the one above 12 is the day; if
 * neither is, the day comes first.
 */
export function dateToWords(text : string) : string|null {
    const parts = toAsciiDigits(text).split(/[/.-]/);
    if (parts.length !== 3 || !parts.every((p) => /^[0-9]+$/.test(p)))
        return null;

    let year : number, month : number, day : number;
    const [first, second, third] = parts.map((p) => parseInt(p, 10));
    if (parts[0].length === 4) {
        [year, month, day] = [first, second, third];
    } else if (parts[2].length === 4) {
        year = third;
        if (second > 12 && first <= 12)
            [month, day] = [first, second];
        else
            [day, month] = [first, second];
    } else {
        return null;
    }

    if (month < 1 || month > 12 || day < 1 || day > 31)
        return null;
    return `${integerToWords(String(day))}ی ${MONTHS[month-1]}ی ساڵی ${integerToWords(String(year))}`;
}

/**
 * Read a clock time in words.
 *
 * The hour is given on the clock as written; the meridiem, if any, comes
 * from a marker that follows the time.
 */
export function timeToWords(text : string, meridiem : Meridiem|null) : string|null {
    const match = /^([0-9]+):([0-9]+)(?::[0-9]+)?/.exec(toAsciiDigits(text));
    if (match === null)
        return null;

    let hour = parseInt(match[1], 10);
    let minute = parseInt(match[2], 10);
    hour += Math.floor(minute / 60);
    minute %= 60;

    if (meridiem === 'night')
        meridiem = hour === 12 || (hour >= 1 && hour <= 4) ? 'am' : 'pm';

    let hour24 = hour;
    if (meridiem === 'pm' && hour >= 1 && hour < 12)
        hour24 = hour + 12;
    else if (meridiem === 'am' && hour === 12)
        hour24 = 0;
    hour24 %= 24;

    const hourWords = intToKurdish(hour24 % 12 || 12);
    const minuteWords = intToKurdish(minute);

    if (meridiem !== null || hour > 12 || hour === 0) {
        const period = timePeriod(hour24);
        if (minute === 0)
            return `${hourWords}ی ${period}`;
        if (minute === 30)
            return `${hourWords} و نیوی ${period}`;
        return `${hourWords} و ${minuteWords} خولەکی ${period}`;
    }

    if (minute === 0)
        return hourWords;
    if (minute === 30)
        return `${hourWords} و نیو`;
    return `${hourWords} و ${minuteWords} خولەک`;
}

/**
 * Read DATE and TIME tokens.
 *
 * A time absorbs the AM/PM or part-of-day marker that follows it, up to
 * three tokens long, together with a grammatical suffix attached to the
 * marker ("12:30 PMـە").
 */
export default class DateTimeNormalizer extends BaseModule {
    readonly name = 'DateTimeNormalizer';
    readonly priority = 95;

    constructor(config : NormalizationConfig) {
        super(config, 'date-time');
    }

    process(tokens : Token[]) : Token[] {
        tokens.forEach((token, i) => {
            if (token.type === TokenType.DATE)
                this._processDate(token);
            else if (token.type === TokenType.TIME)
                this._processTime(tokens, i);
        });
        return this._compact(tokens);
    }

    private _processDate(token : Token) : void {
        const words = dateToWords(token.text);
        if (words === null) {
            this._logger.debug(`${token.text} is not a valid date`);
            return;
        }
        token.convert(words);
        token.tags.add(Tag.DATE);
    }

    private _findMarker(tokens : Token[], i : number) : MarkerMatch|null {
        for (let length = MARKER_WINDOW; length > 0; length--) {
            if (i + length >= tokens.length)
                continue;
            const window = tokens.slice(i + 1, i + 1 + length);
            // the marker must not run across a line or end on punctuation
            if (window.slice(0, -1).some((t) => /[\r\n]/.test(t.whitespaceAfter)) || /[\r\n]/.test(tokens[i].whitespaceAfter))
                continue;
            if (window[window.length-1].type === TokenType.SYMBOL || window.some((t) => t.isTombstone || t.isConverted))
                continue;

            const found = matchMarker(window.map((t) => t.text).join(' '));
            if (found !== null)
                return { ...found, length };
        }
        return null;
    }

    private _processTime(tokens : Token[], i : number) : void {
        const token = tokens[i];

        let meridiem : Meridiem|null = null;
        let suffix = '';
        // "12:30pm"
        const inline = token.text.replace(/[0-9٠-٩۰-۹:]/g, '');
        if (inline)
            meridiem = inline.toLowerCase().startsWith('a') ? 'am' : 'pm';

        const marker = this._findMarker(tokens, i);
        if (marker !== null) {
            meridiem = marker.meridiem;
            suffix = marker.suffix;
            token.whitespaceAfter = tokens[i + marker.length].whitespaceAfter;
            for (let j = i + 1; j <= i + marker.length; j++) {
                tokens[j].consume();
                tokens[j].whitespaceAfter = '';
            }
        }

        const words = timeToWords(token.text, meridiem);
        if (words === null) {
            this._logger.debug(`${token.text} is not a valid time`);
            return;
        }
        token.convert(appendSuffix(words, suffix));
        token.tags.add(Tag.TIME);
    }
}
