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

export type EmojiMode = 'remove'|'convert'|'ignore';
export type DiacriticsMode = 'convert'|'remove'|'keep';
export type ShaddaMode = 'double'|'remove';

const EMOJI_MODES : readonly EmojiMode[] = ['remove', 'convert', 'ignore'];
const DIACRITICS_MODES : readonly DiacriticsMode[] = ['convert', 'remove', 'keep'];
const SHADDA_MODES : readonly ShaddaMode[] = ['double', 'remove'];

/**
 * The configuration of a normalization pipeline.
 *
 * A configuration is created once with {@link makeConfig}, and shared read-only
 * by all modules of a pipeline.
 */
export interface NormalizationConfig {
    readonly enableNumbers : boolean;
    readonly enableWeb : boolean;
    readonly enablePhone : boolean;
    readonly enableDateTime : boolean;
    readonly enableUnits : boolean;
    readonly enableCurrency : boolean;
    readonly enableTechnical : boolean;
    readonly enableMath : boolean;
    readonly enableDiacritics : boolean;
    readonly enableSymbols : boolean;
    readonly enableLinguistics : boolean;
    readonly enableTransliteration : boolean;
    /**
     * Insert "|" between the groups of phone numbers, which TTS engines read as a short pause.
     */
    readonly enablePauseMarkers : boolean;

    readonly emojiMode : EmojiMode;
    readonly diacriticsMode : DiacriticsMode;
    readonly shaddaMode : ShaddaMode;
}

export const DEFAULT_CONFIG : NormalizationConfig = Object.freeze({
    enableNumbers: true,
    enableWeb: true,
    enablePhone: true,
    enableDateTime: true,
    enableUnits: true,
    enableCurrency: true,
    enableTechnical: true,
    enableMath: true,
    enableDiacritics: true,
    enableSymbols: true,
    enableLinguistics: true,
    enableTransliteration: true,
    enablePauseMarkers: false,

    emojiMode: 'remove',
    diacriticsMode: 'convert',
    shaddaMode: 'double',
});

export class ConfigurationError extends Error {
    code : string;

    constructor(message : string) {
        super(message);
        this.name = 'ConfigurationError';
        this.code = 'EINVAL';
    }
}

function checkChoice<T extends string>(key : string, value : unknown, allowed : readonly T[]) : T {
    const found = allowed.find((choice) => choice === value);
    if (found === undefined)
        throw new ConfigurationError(`Invalid value ${JSON.stringify(value)} for ${key}, expected one of ${allowed.join(', ')}`);
    return found;
}

/**
 * Build a validated, frozen configuration, starting from the defaults.
 *
 * Unknown keys and values of the wrong type are rejected here, so an invalid
 * configuration fails when the pipeline is constructed rather than in the middle
 * of normalizing text.
 */
export function makeConfig(overrides : Partial<NormalizationConfig> = {}) : NormalizationConfig {
    const defaults : Record<string, unknown> = { ...DEFAULT_CONFIG };
    for (const [key, value] of Object.entries(overrides)) {
        if (!(key in defaults))
            throw new ConfigurationError(`Unknown configuration key ${key}`);
        if (key.startsWith('enable') && typeof value !== 'boolean')
            throw new ConfigurationError(`Invalid value ${JSON.stringify(value)} for ${key}, expected a boolean`);
    }

    const merged = { ...DEFAULT_CONFIG, ...overrides };
    return Object.freeze({
        ...merged,
        emojiMode: checkChoice('emojiMode', merged.emojiMode, EMOJI_MODES),
        diacriticsMode: checkChoice('diacriticsMode', merged.diacriticsMode, DIACRITICS_MODES),
        shaddaMode: checkChoice('shaddaMode', merged.shaddaMode, SHADDA_MODES),
    });
}
