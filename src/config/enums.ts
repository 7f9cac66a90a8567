import { assertNever, ConfigurationError } from "../core/errors.js";

export const INSTRUMENTS = ["lowres", "velos", "qe", "timstof"] as const;
export type Instrument = (typeof INSTRUMENTS)[number];

export const ACTIVATIONS = ["auto", "cid", "etd", "hcd"] as const;
export type Activation = (typeof ACTIVATIONS)[number];

export const ENZYMES = [
  "unspecific",
  "trypsin",
  "chymotrypsin",
  "lysc",
  "lysn",
  "gluc",
  "argc",
  "aspn",
  "alphalp",
  "nodigestion"
] as const;
export type Enzyme = (typeof ENZYMES)[number];

export const ISOBARIC_PLEXES = ["tmt6plex", "tmt10plex", "tmt11plex", "tmt16plex", "tmt18plex", "itraq4plex", "itraq8plex"] as const;
export type IsobaricPlex = (typeof ISOBARIC_PLEXES)[number];

export const ACCESSION_TYPES = ["protein", "gene", "symbol"] as const;
export type AccessionType = (typeof ACCESSION_TYPES)[number];

/** Granularities of the merged output tables. */
export const FEATURE_TYPES = ["peptide", "protein", "gene", "symbol"] as const;
export type FeatureType = (typeof FEATURE_TYPES)[number];

export function isInstrument(value: string): value is Instrument {
  return INSTRUMENTS.some((i) => i === value);
}

/** MSGF+ `-inst` code. */
export function msgfInstrumentCode(instrument: Instrument): number {
  switch (instrument) {
    case "lowres":
      return 0;
    case "velos":
      return 1;
    case "timstof":
      return 2;
    case "qe":
      return 3;
    default:
      return assertNever(instrument, "instrument");
  }
}

/** MSGF+ `-m` fragmentation code. */
export function msgfFragmentationCode(activation: Activation): number {
  switch (activation) {
    case "auto":
      return 0;
    case "cid":
      return 1;
    case "etd":
      return 2;
    case "hcd":
      return 3;
    default:
      return assertNever(activation, "activation");
  }
}

/** MSGF+ `-e` enzyme code. */
export function msgfEnzymeCode(enzyme: Enzyme): number {
  switch (enzyme) {
    case "unspecific":
      return 0;
    case "trypsin":
      return 1;
    case "chymotrypsin":
      return 2;
    case "lysc":
      return 3;
    case "lysn":
      return 4;
    case "gluc":
      return 5;
    case "argc":
      return 6;
    case "aspn":
      return 7;
    case "alphalp":
      return 8;
    case "nodigestion":
      return 9;
    default:
      return assertNever(enzyme, "enzyme");
  }
}

export function isobaricChannels(plex: IsobaricPlex): readonly string[] {
  switch (plex) {
    case "tmt6plex":
      return ["126", "127", "128", "129", "130", "131"];
    case "tmt10plex":
      return ["126", "127N", "127C", "128N", "128C", "129N", "129C", "130N", "130C", "131"];
    case "tmt11plex":
      return ["126", "127N", "127C", "128N", "128C", "129N", "129C", "130N", "130C", "131N", "131C"];
    case "tmt16plex":
      return [
        "126", "127N", "127C", "128N", "128C", "129N", "129C", "130N",
        "130C", "131N", "131C", "132N", "132C", "133N", "133C", "134N"
      ];
    case "tmt18plex":
      return [
        "126", "127N", "127C", "128N", "128C", "129N", "129C", "130N", "130C",
        "131N", "131C", "132N", "132C", "133N", "133C", "134N", "134C", "135N"
      ];
    case "itraq4plex":
      return ["114", "115", "116", "117"];
    case "itraq8plex":
      return ["113", "114", "115", "116", "117", "118", "119", "121"];
    default:
      return assertNever(plex, "isobaric");
  }
}

export function requireInstrument(value: string, context: string): Instrument {
  const v = value.trim().toLowerCase();
  if (isInstrument(v)) return v;
  throw new ConfigurationError(`${context}: unknown instrument "${value}" (expected one of ${INSTRUMENTS.join(", ")})`);
}

/** MSGF+ `-protocol` code for labelled samples; null leaves the option out. */
export function msgfProtocolCode(plex: IsobaricPlex | null): number | null {
  if (plex === null) return null;
  switch (plex) {
    case "tmt6plex":
    case "tmt10plex":
    case "tmt11plex":
    case "tmt16plex":
    case "tmt18plex":
      return 4;
    case "itraq4plex":
    case "itraq8plex":
      return 2;
    default:
      return assertNever(plex, "isobaric");
  }
}
