import { describe, it, expect } from 'vitest';
import { applyTransforms } from '../../src/application/stream-transform.js';
import type { TransformPolicy } from '../../src/application/stream-transform.js';
import { DuplicateWeightIdError, WeightIdNotFoundError, orderedWeightIds } from '../../src/domain/index.js';
import { collect, groupsOf, makeDocument, makeEvent, makeInit, weightGroup } from '../helpers.js';

const appendNominal: TransformPolicy = { kind: 'append-weight', group: 'extra', weightId: 'nominal', text: 'central' };

describe('applyTransforms', () => {
  it('passes events through unchanged without policies', async () => {
    const events = [makeEvent({ weight: 1 }), makeEvent({ weight: 2 })];
    const transformed = applyTransforms(makeDocument(events), []);

    expect(await collect(transformed.events)).toEqual(events);
    expect(transformed.events.eventsSeen).toBe(2);
    expect(transformed.events.eventsDropped).toBe(0);
  });

  it('copies the central weight into an appended weight', async () => {
    const document = makeDocument([makeEvent({ weight: 0.5 }), makeEvent({ weight: -2, weights: { a: 3 } })], makeInit({
      weightGroups: groupsOf(weightGroup('scale', ['a'])),
    }));

    const transformed = applyTransforms(document, [appendNominal]);

    expect(orderedWeightIds(transformed.init)).toEqual(['a', 'nominal']);
    const events = await collect(transformed.events);
    expect(events.map((e) => Object.fromEntries(e.weights))).toEqual([{ nominal: 0.5 }, { a: 3, nominal: -2 }]);
  });

  it('changes the header before any event is pulled', () => {
    const document = makeDocument([makeEvent()]);
    applyTransforms(document, [appendNominal]);

    expect(document.init.weightGroups.has('extra')).toBe(true);
    expect(document.events.pulled).toBe(0);
  });

  it('replaces the central weight and drops events without the kept weight', async () => {
    const document = makeDocument(
      [
        makeEvent({ weight: 1, weights: { a: 1.5, b: 2 } }),
        makeEvent({ weight: 1, weights: { b: 4 } }),
        makeEvent({ weight: 1, weights: { a: -0.5 } }),
      ],
      makeInit({ weightGroups: groupsOf(weightGroup('scale', ['a', 'b'])) }),
    );

    const transformed = applyTransforms(document, [{ kind: 'restrict-to-weight', weightId: 'a' }]);
    const events = await collect(transformed.events);

    expect(events.map((e) => e.eventInfo.weight)).toEqual([1.5, -0.5]);
    expect(events.map((e) => [...e.weights.keys()])).toEqual([['a'], ['a']]);
    expect(transformed.events.eventsSeen).toBe(3);
    expect(transformed.events.eventsDropped).toBe(1);
    expect(orderedWeightIds(transformed.init)).toEqual(['a']);
  });

  it('applies policies in order so an appended weight can be kept', async () => {
    const document = makeDocument([makeEvent({ weight: 7, weights: { a: 1 } })], makeInit({
      weightGroups: groupsOf(weightGroup('scale', ['a'])),
    }));

    const transformed = applyTransforms(document, [appendNominal, { kind: 'restrict-to-weight', weightId: 'nominal' }]);
    const [event] = await collect(transformed.events);

    expect(event?.eventInfo.weight).toBe(7);
    expect(Object.fromEntries(event?.weights ?? [])).toEqual({ nominal: 7 });
    expect([...transformed.init.weightGroups.keys()]).toEqual(['extra']);
  });

  it('raises weight errors before reading events', () => {
    const duplicate = makeDocument([makeEvent()], makeInit({ weightGroups: groupsOf(weightGroup('scale', ['nominal'])) }));
    expect(() => applyTransforms(duplicate, [appendNominal])).toThrow(DuplicateWeightIdError);
    expect(duplicate.events.pulled).toBe(0);

    const missing = makeDocument([makeEvent()]);
    expect(() => applyTransforms(missing, [{ kind: 'restrict-to-weight', weightId: 'x' }])).toThrow(WeightIdNotFoundError);
  });

  it('closes the source when the stream is abandoned', async () => {
    const document = makeDocument([makeEvent(), makeEvent()]);
    const transformed = applyTransforms(document, []);

    await transformed.events.next();
    await transformed.events.return();

    expect(document.events.returned).toBe(true);
  });
});
