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

import { digitGroupToWords } from '../utils/numbers';
import { Token, TokenType } from '../tokenizer/token';
import { toAsciiDigits } from '../tokenizer/helpers';
import { NormalizationConfig } from '../config';
import { BaseModule } from './base';

const PLUS = 'کۆ';
const PAUSE = ' | ';

// country calling codes, matched longest first
const COUNTRY_CODES = new Set([
    '1', '7', '20', '27', '30', '31', '32', '33', '34', '36', '39', '40', '41', '43', '44', '45', '46', '47',
    '48', '49', '51', '52', '55', '60', '61', '62', '63', '64', '65', '66', '81', '82', '84', '86', '90',
    '91', '92', '93', '94', '98', '212', '213', '216', '218', '353', '358', '961', '962', '963', '964',
    '965', '966', '967', '968', '970', '971', '972', '973', '974', '994', '995'
]);

/**
 * Split the digits of a national number in groups: 3-3-2-2 for ten digits,
 * otherwise groups of three, ending with groups of two.
 */
export function groupDigits(digits : string) : string[] {
    const sizes : number[] = [];
    let rest = digits.length;
    while (rest > 4) {
        sizes.push(3);
        rest -= 3;
    }
    if (rest === 4)
        sizes.push(2, 2);
    else if (rest > 0)
        sizes.push(rest);

    const groups : string[] = [];
    let start = 0;
    for (const size of sizes) {
        groups.push(digits.substring(start, start + size));
        start += size;
    }
    return groups;
}

export function splitCountryCode(digits : string) : [string, string] {
    for (const length of [3, 2, 1]) {
        const prefix = digits.substring(0, length);
        if (COUNTRY_CODES.has(prefix))
            return [prefix, digits.substring(length)];
    }
    return [digits.substring(0, 3), digits.substring(3)];
}

/**
 * Read phone numbers group by group.
 *
 * Local mobile numbers are grouped 4-3-2-2 (0750 123 45 67). International
 * numbers start with "کۆ" and the country code.
 */
export default class PhoneNormalizer extends BaseModule {
    readonly name = 'PhoneNormalizer';
    readonly priority = 98;

    constructor(config : NormalizationConfig) {
        super(config, 'phone');
    }

    process(tokens : Token[]) : Token[] {
        for (const token of tokens) {
            if (token.type !== TokenType.PHONE)
                continue;
            token.convert(this.readNumber(token.text));
        }
        return tokens;
    }

    readNumber(text : string) : string {
        const separator = this._config.enablePauseMarkers ? PAUSE : ' ';
        const normalized = toAsciiDigits(text);
        const digits = normalized.replace(/[^0-9]/g, '');

        let groups : string[];
        if (normalized.trim().startsWith('+')) {
            const [country, national] = splitCountryCode(digits);
            groups = [country, ...groupDigits(national)];
            return PLUS + ' ' + groups.map(digitGroupToWords).join(separator);
        }

        if (digits.length === 11)
            groups = [digits.substring(0, 4), ...groupDigits(digits.substring(4))];
        else
            groups = groupDigits(digits);
        return groups.map(digitGroupToWords).join(separator);
    }
}
