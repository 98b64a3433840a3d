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

import unitNames from '../data/units.json';
import { splitSuffix } from './suffixes';

const UNITS = new Map<string, string>(Object.entries(unitNames));

export interface UnitWord {
    // the Kurdish name of the unit
    name : string;
    // a Kurdish suffix attached to the abbreviation, as in "kmـە"
    suffix : string;
}

/**
 * Look up a unit abbreviation, ignoring case and an attached Kurdish suffix.
 */
export function lookupUnit(text : string) : UnitWord|null {
    const [base, suffix] = splitSuffix(text);
    const name = UNITS.get(base.toLowerCase());
    return name === undefined ? null : { name, suffix };
}
