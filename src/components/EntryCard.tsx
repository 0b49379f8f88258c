import React, { useEffect, useState } from 'react';
import { formatGrams, formatInputValue, formatRatio, parseGramsInput } from '../utils/formatting';
import { QUANTITY_FIELDS, isInvalidInputError, readQuantity } from '../utils/macroEntry';
import type { MacroEntry, QuantityField } from '../utils/macroEntry';
import type { DerivedValues } from '../utils/derivation';

interface FieldInput {
  field: QuantityField;
  label: string;
  placeholder: string;
}

const FIELD_INPUTS: FieldInput[] = [
  { field: 'protein', label: '💪 Protein (g)', placeholder: '0' },
  { field: 'fat', label: '🥑 Fat (g)', placeholder: '0' },
  { field: 'totalCarb', label: '🍞 Total carbs (g)', placeholder: '0' },
  { field: 'fiber', label: '🌾 Fiber (g)', placeholder: '0' },
  { field: 'servings', label: 'Servings used', placeholder: '0' },
];

type Drafts = Record<QuantityField, string>;
type FieldErrors = Partial<Record<QuantityField, string>>;

function initialDrafts(entry: Readonly<MacroEntry>): Drafts {
  return {
    protein: formatInputValue(entry.proteinGrams),
    fat: formatInputValue(entry.fatGrams),
    totalCarb: formatInputValue(entry.totalCarbGrams),
    fiber: formatInputValue(entry.fiberGrams),
    servings: formatInputValue(entry.servings),
  };
}

function parsedDraft(field: QuantityField, text: string): number | undefined {
  try {
    return parseGramsInput(field, text);
  } catch (err) {
    if (!isInvalidInputError(err)) throw err;
    return undefined;
  }
}

export function entryDisplayName(entry: Readonly<MacroEntry>, index: number): string {
  return entry.label.trim() || `Item ${index + 1}`;
}

export interface EntryCardProps {
  entry: Readonly<MacroEntry>;
  index: number;
  derived: DerivedValues | undefined;
  precision: number;
  onQuantityChange: (id: string, field: QuantityField, value: number) => void;
  onLabelChange: (id: string, label: string) => void;
  onRemove: (id: string) => void;
}

export function EntryCard({
  entry,
  index,
  derived,
  precision,
  onQuantityChange,
  onLabelChange,
  onRemove,
}: EntryCardProps) {
  // Drafts hold exactly what the user typed; the store only ever sees parsed numbers.
  const [drafts, setDrafts] = useState<Drafts>(() => initialDrafts(entry));
  const [errors, setErrors] = useState<FieldErrors>({});
  const displayName = entryDisplayName(entry, index);

  // Follow edits made outside this card. Text that already reads as the stored value
  // ("2." while typing) and fields showing an error are left alone.
  useEffect(() => {
    setDrafts((prev) => {
      let next = prev;
      for (const field of QUANTITY_FIELDS) {
        const stored = readQuantity(entry, field);
        if (errors[field] || parsedDraft(field, prev[field]) === stored) continue;
        next = { ...next, [field]: formatInputValue(stored) };
      }
      return next;
    });
  }, [entry, errors]);

  const handleQuantityChange = (field: QuantityField) => (e: React.ChangeEvent<HTMLInputElement>) => {
    const text = e.target.value;
    setDrafts((prev) => ({ ...prev, [field]: text }));

    try {
      onQuantityChange(entry.id, field, parseGramsInput(field, text));
      setErrors((prev) => ({ ...prev, [field]: undefined }));
    } catch (err) {
      if (!isInvalidInputError(err)) throw err;
      setErrors((prev) => ({ ...prev, [field]: err.message }));
    }
  };

  return (
    <div className="card entry-card animate-slide-up" data-testid={`${entry.id}-card`}>
      <div className="card-header flex items-center justify-between">
        <input
          aria-label={`Name of ${displayName}`}
          className="form-input entry-name-input"
          placeholder={`Item ${index + 1}`}
          value={entry.label}
          onChange={(e) => onLabelChange(entry.id, e.target.value)}
        />
        <button
          type="button"
          className="btn btn-secondary"
          aria-label={`Remove ${displayName}`}
          onClick={() => onRemove(entry.id)}
        >
          ✕
        </button>
      </div>

      <div className="card-body">
        <div className="grid grid-cols-2 gap-4 sm:grid-cols-5">
          {FIELD_INPUTS.map(({ field, label, placeholder }) => {
            const inputId = `${entry.id}-${field}`;
            const error = errors[field];
            return (
              <div className="form-group" key={field}>
                <label htmlFor={inputId} className="form-label">
                  {label}
                </label>
                <input
                  id={inputId}
                  type="text"
                  inputMode="decimal"
                  value={drafts[field]}
                  placeholder={placeholder}
                  onChange={handleQuantityChange(field)}
                  aria-invalid={error ? true : undefined}
                  className={`form-input ${error ? 'form-input-error' : ''}`}
                />
                {error && (
                  <p role="alert" className="form-error" data-testid={`${inputId}-error`}>
                    {error}
                  </p>
                )}
              </div>
            );
          })}
        </div>
      </div>

      {derived && (
        <div className="card-footer entry-results">
          <p data-testid={`${entry.id}-net-carbs`}>Net carbs: {formatGrams(derived.netCarbGrams, precision)} g</p>
          <p data-testid={`${entry.id}-energy`}>Energy: {formatGrams(derived.energyGrams, precision)} g</p>
          <p data-testid={`${entry.id}-ratio`}>P:E ratio: {formatRatio(derived.ratio, precision)}</p>
        </div>
      )}
    </div>
  );
}
