export type ConcentrationUnit = "mg/mL" | "g/L" | "M" | "mM" | "µM";

export type ConversionResult = { ok: true; value: number } | { ok: false; error: string };

type UnitDefinition = {
  basis: "mass" | "molar";
  /** Factor to the basis unit: g/L for mass units, mM for molar units. */
  factor: number;
};

const units: Record<ConcentrationUnit, UnitDefinition> = {
  "mg/mL": { basis: "mass", factor: 1 },
  "g/L": { basis: "mass", factor: 1 },
  M: { basis: "molar", factor: 1000 },
  mM: { basis: "molar", factor: 1 },
  "µM": { basis: "molar", factor: 0.001 }
};

const unitAliases: Record<string, ConcentrationUnit> = {
  "mg/ml": "mg/mL",
  "g/l": "g/L",
  m: "M",
  mm: "mM",
  "µm": "µM",
  "μm": "µM",
  um: "µM"
};

const isConcentrationUnit = (value: string): value is ConcentrationUnit =>
  Object.hasOwn(units, value);

export const resolveConcentrationUnit = (raw: string): ConcentrationUnit | null => {
  const trimmed = raw.trim();
  if (isConcentrationUnit(trimmed)) {
    return trimmed;
  }
  const key = trimmed.toLowerCase();
  return Object.hasOwn(unitAliases, key) ? unitAliases[key] : null;
};

/**
 * Linear conversion between mass (mg/mL, g/L) and molar (M, mM, µM)
 * concentrations. Crossing between the two bases needs the molar mass in g/mol.
 */
export const convertConcentration = (
  value: number,
  from: string,
  to: string,
  molarMass?: number
): ConversionResult => {
  const fromUnit = resolveConcentrationUnit(from);
  const toUnit = resolveConcentrationUnit(to);
  if (!fromUnit) {
    return { ok: false, error: `Unknown concentration unit: ${from}` };
  }
  if (!toUnit) {
    return { ok: false, error: `Unknown concentration unit: ${to}` };
  }
  if (!Number.isFinite(value)) {
    return { ok: false, error: "Concentration value must be a finite number" };
  }

  const source = units[fromUnit];
  const target = units[toUnit];
  const baseValue = value * source.factor;

  if (source.basis === target.basis) {
    return { ok: true, value: baseValue / target.factor };
  }

  if (molarMass === undefined || !Number.isFinite(molarMass) || molarMass <= 0) {
    return {
      ok: false,
      error: `Molar mass required to convert ${fromUnit} to ${toUnit}`
    };
  }

  // g/L divided by g/mol gives mol/L; times 1000 gives mM.
  const converted =
    source.basis === "mass" ? (baseValue / molarMass) * 1000 : (baseValue / 1000) * molarMass;
  return { ok: true, value: converted / target.factor };
};
