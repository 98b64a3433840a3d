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

import { Logger, getLogger } from 'log4js';

import { NormalizationConfig } from '../config';
import { Token, TokenType, compact } from '../tokenizer/token';

/**
 * The interface implemented by every normalization pass.
 */
export interface Module {
    readonly name : string;
    /**
     * Modules run from the highest priority to the lowest.
     */
    readonly priority : number;

    /**
     * Transform the token list.
     *
     * Implementations can mutate tokens in place, merge them into a neighbor
     * (by emptying the text of the consumed token), or return a new list with
     * tokens split apart. They must not reorder unrelated tokens.
     */
    process(tokens : Token[]) : Token[];
}

export abstract class BaseModule implements Module {
    protected readonly _config : NormalizationConfig;
    protected readonly _logger : Logger;

    abstract readonly name : string;
    abstract readonly priority : number;

    constructor(config : NormalizationConfig, loggerName : string) {
        this._config = config;
        this._logger = getLogger('ckb-normalizer.' + loggerName);
    }

    abstract process(tokens : Token[]) : Token[];

    protected _compact(tokens : Token[]) : Token[] {
        return compact(tokens);
    }

    protected _prevIndex(tokens : Token[], i : number) : number {
        for (let j = i-1; j >= 0; j--) {
            if (!tokens[j].isTombstone)
                return j;
        }
        return -1;
    }

    protected _nextIndex(tokens : Token[], i : number) : number {
        for (let j = i+1; j < tokens.length; j++) {
            if (!tokens[j].isTombstone)
                return j;
        }
        return -1;
    }

    protected _prev(tokens : Token[], i : number) : Token|undefined {
        const j = this._prevIndex(tokens, i);
        return j >= 0 ? tokens[j] : undefined;
    }

    protected _next(tokens : Token[], i : number) : Token|undefined {
        const j = this._nextIndex(tokens, i);
        return j >= 0 ? tokens[j] : undefined;
    }

    /**
     * Make sure a converted token is separated by whitespace from its neighbor.
     */
    protected _ensureSpaceAfter(token : Token|undefined) : void {
        if (token && !token.whitespaceAfter)
            token.whitespaceAfter = ' ';
    }
}

export function isNumeric(token : Token|undefined) : boolean {
    if (!token)
        return false;
    if (token.type === TokenType.NUMBER)
        return true;
    return /^[0-9٠-٩۰-۹][0-9٠-٩۰-۹,٬]*(?:[.٫][0-9٠-٩۰-۹]+)?$/.test(token.originalText) && token.type !== TokenType.DATE;
}
