import React from 'react';
import { formatGrams, formatRatio } from '../utils/formatting';
import type { AggregateEntry } from '../utils/aggregation';
import type { DerivedValues } from '../utils/derivation';

interface TotalsCardProps {
  totals: AggregateEntry;
  derived: DerivedValues;
  precision: number;
}

export function TotalsCard({ totals, derived, precision }: TotalsCardProps) {
  const rows = [
    { label: 'Protein', value: totals.proteinGrams, testId: 'total-protein' },
    { label: 'Fat', value: totals.fatGrams, testId: 'total-fat' },
    { label: 'Net carbs', value: derived.netCarbGrams, testId: 'total-net-carbs' },
    { label: 'Energy', value: derived.energyGrams, testId: 'total-energy' },
  ];

  return (
    <div className="card enhanced-macro-card mb-6">
      <div className="macro-header">
        <h2>Recipe totals</h2>
      </div>
      <div className="macro-grid">
        {rows.map((row) => (
          <div key={row.label} className="macro-total">
            <span className="macro-total-label">{row.label}</span>
            <span data-testid={row.testId}>{formatGrams(row.value, precision)} g</span>
          </div>
        ))}
      </div>
      <div className="macro-summary">
        <span>P:E ratio</span>
        <strong className="total-ratio" data-testid="total-ratio">
          {formatRatio(derived.ratio, precision)}
        </strong>
      </div>
    </div>
  );
}
