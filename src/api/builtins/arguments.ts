/**
 * Argument schemas for the built-in endpoints
 */

import {
  countArgument,
  defineArguments,
  flagArgument,
  fragmentsArgument,
  terminatorArgument,
  textArgument,
} from '../validation.js';
import { DEFAULT_CONCATENATE, DEFAULT_ENDING } from '../../connection/payload.js';
import type { ReadOptions, SendOptions } from '../../connection/types.js';

const dataField = fragmentsArgument.describe('Data the serial port should send; is required');
const endingField = textArgument
  .default(DEFAULT_ENDING)
  .describe('Ending appended to the data before sending; default carriage return + newline');
const concatenateField = textArgument
  .default(DEFAULT_CONCATENATE)
  .describe('What the strings in data are joined by when more than one is given; default a space');
const readUntilField = terminatorArgument
  .default(null)
  .describe('Terminator the received string is read until, excluding it; default the whole string');
const stripField = flagArgument
  .default(false)
  .describe('If the received string should be stripped of surrounding whitespace and newlines');
const responseField = textArgument.describe('String the serial port should receive; is required');

export const sendArguments = defineArguments({
  data: dataField,
  ending: endingField,
  concatenate: concatenateField,
});

export const receiveArguments = defineArguments({
  num_before: countArgument.default(0).describe('Which receive record to return; 0 is the most recent'),
  read_until: readUntilField,
  strip: stripField,
});

export const readArguments = defineArguments({
  read_until: readUntilField,
  strip: stripField,
});

export const sendReadArguments = defineArguments({
  data: dataField,
  ending: endingField,
  concatenate: concatenateField,
  read_until: readUntilField,
  strip: stripField,
});

export const waitArguments = defineArguments({
  response: responseField,
  read_until: readUntilField,
  strip: stripField,
});

export const sendForResponseArguments = defineArguments({
  response: responseField,
  data: dataField,
  ending: endingField,
  concatenate: concatenateField,
  read_until: readUntilField,
  strip: stripField,
});

export function toReadOptions(args: { read_until: string | null; strip: boolean }): ReadOptions {
  return args.read_until === null ? { strip: args.strip } : { readUntil: args.read_until, strip: args.strip };
}

export function toSendOptions(args: { ending: string; concatenate: string }): SendOptions {
  return { ending: args.ending, concatenate: args.concatenate };
}
