import React from 'react';
import { useEntryStore } from '../hooks/useEntryStore';
import { useShareLink } from '../hooks/useShareLink';
import { netCarbs, scaledAmounts } from '../utils/derivation';
import { formatGrams, formatRatio } from '../utils/formatting';
import type { EntryStore, StoreSnapshot } from '../utils/entryStore';
import type { MacroAmounts, QuantityField } from '../utils/macroEntry';
import { EntryCard, entryDisplayName } from './EntryCard';
import { TotalsCard } from './TotalsCard';

function Intro() {
  return (
    <div className="text-center mb-8">
      <div className="logo mb-6 justify-center">
        <div className="logo-icon">🥩</div>
        <span>P:E Calculator</span>
      </div>
      <p className="text-gray-600">
        The P:E diet ranks foods by protein relative to energy (fat + net carbs). Enter the
        per-serving macros from each food label and how many servings you use; the ratio of
        every item and of the whole recipe updates as you type.
      </p>
    </div>
  );
}

function MacroCell({ amounts, precision }: { amounts: MacroAmounts; precision: number }) {
  const carbs = netCarbs(amounts.totalCarbGrams, amounts.fiberGrams);
  return (
    <td>
      P {formatGrams(amounts.proteinGrams, precision)} / F {formatGrams(amounts.fatGrams, precision)} / C{' '}
      {formatGrams(carbs, precision)}
    </td>
  );
}

interface SummaryTableProps {
  store: EntryStore;
  entries: StoreSnapshot['entries'];
  precision: number;
}

function SummaryTable({ store, entries, precision }: SummaryTableProps) {
  return (
    <div className="card">
      <div className="card-header">
        <h3 className="font-medium text-gray-900">Summary</h3>
      </div>
      <div className="card-body">
        <table className="summary-table">
          <thead>
            <tr>
              <th>Item</th>
              <th>Per serving (g)</th>
              <th>Servings</th>
              <th>In recipe (g)</th>
              <th>P:E ratio</th>
            </tr>
          </thead>
          <tbody>
            {entries.map((entry, index) => {
              const derived = store.getDerived(entry.id);
              return (
                <tr key={entry.id} data-testid={`${entry.id}-summary`}>
                  <td>{entryDisplayName(entry, index)}</td>
                  <MacroCell amounts={entry} precision={precision} />
                  <td>{formatGrams(entry.servings, precision)}</td>
                  <MacroCell amounts={scaledAmounts(entry)} precision={precision} />
                  <td>{derived ? formatRatio(derived.ratio, precision) : '—'}</td>
                </tr>
              );
            })}
          </tbody>
        </table>
      </div>
    </div>
  );
}

interface CalculatorProps {
  store: EntryStore;
  precision: number;
}

export function Calculator({ store, precision }: CalculatorProps) {
  const snapshot = useEntryStore(store);
  useShareLink(snapshot);

  const handleQuantityChange = (id: string, field: QuantityField, value: number) => {
    store.updateField(id, field, value);
  };

  return (
    <div className="mobile-container">
      <div className="min-h-screen p-6">
        <Intro />

        <div className="card mb-6">
          <div className="card-body flex items-end gap-3">
            <div className="form-group flex-1">
              <label htmlFor="recipe-name" className="form-label">
                Recipe name
              </label>
              <input
                id="recipe-name"
                className="form-input"
                placeholder="Untitled recipe"
                value={snapshot.recipeName}
                onChange={(e) => store.setRecipeName(e.target.value)}
              />
            </div>
            <button type="button" className="btn btn-secondary" onClick={() => window.print()}>
              Print recipe
            </button>
          </div>
        </div>

        {snapshot.recipeName.trim() && <h1 className="print-title">{snapshot.recipeName.trim()}</h1>}

        <div className="space-y-4 mb-6">
          {snapshot.entries.map((entry, index) => (
            <EntryCard
              key={entry.id}
              entry={entry}
              index={index}
              derived={store.getDerived(entry.id)}
              precision={precision}
              onQuantityChange={handleQuantityChange}
              onLabelChange={(id, label) => store.updateLabel(id, label)}
              onRemove={(id) => store.removeEntry(id)}
            />
          ))}
        </div>

        <button type="button" className="btn btn-primary w-full mb-6" onClick={() => store.addEntry()}>
          <span>＋</span>
          Add item
        </button>

        <TotalsCard totals={store.getAggregate()} derived={store.getAggregateDerived()} precision={precision} />

        <SummaryTable store={store} entries={snapshot.entries} precision={precision} />
      </div>
    </div>
  );
}
