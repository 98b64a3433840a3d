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

import { Tag, Token, TokenType } from './token';

// white spaces
// list from http://jkorpela.fi/chars/spaces.html, plus the line and paragraph separators
// ZWNJ (U+200C) and ZWJ (U+200D) are not whitespace: they occur inside Kurdish words
export const WS = /[ \t\n\r\v\f\u00a0\u180e\u2000-\u200b\u2028\u2029\u202f\u205f\u3000\ufeff]+/;

export function makeToken(raw : string,
                          type : TokenType,
                          tags : Tag[] = []) : Token {
    // raw is the original text that matches the token regular expression
    // the display text starts as a copy, modules rewrite it later
    return new Token(raw, type, { originalText: raw, tags });
}

/**
 * Convert Arabic-Indic and Extended Arabic-Indic digits to ASCII digits, and
 * the Arabic decimal and thousands separators to "." and ",".
 */
export function toAsciiDigits(text : string) : string {
    return text.replace(/[٠-٩]/g, (d) => String(d.charCodeAt(0) - 0x0660))
        .replace(/[۰-۹]/g, (d) => String(d.charCodeAt(0) - 0x06f0))
        .replace(/٫/g, '.')
        .replace(/٬/g, ',');
}
