/**
 * Detector types
 */

export type Normalizer = (text: string) => string;
export type Validator = (text: string) => boolean;

// Compiled detector, ready to run
export type DetectorSpec = {
  name: string;
  pattern: RegExp;
  group: number; // capture group holding the value; 0 = whole match
  normalize?: Normalizer;
  validate?: Validator;
  description: string;
};

// Detector definition as it appears in configuration
export type DetectorDefinition = {
  name: string;
  regex: string;
  flags?: string | string[];
  group?: number;
  normalize?: string | string[];
  validate?: string | string[];
  desc?: string;
};

// One accepted match inside a text value, before it is tied to a document
export type DetectionFragment = {
  detector: string;
  rawText: string;
  normalizedText: string;
  index: number;
};

export type RawMatch = Readonly<{
  documentId: string;
  fieldPath: string;
  detector: string;
  rawText: string;
  normalizedText: string;
}>;
