import type { StateCreator } from "zustand/vanilla";
import { createStore } from "zustand/vanilla";
import type { ScoreModel } from "../scoring/score-model";
import type { EventOrder, TallyEvent } from "../shared/types/event";
import type { ScoreSnapshot } from "../shared/types/score";
import type { EventStore } from "../store/eventStore";
import type { TapPreferences } from "../store/preferences";

export interface TrackerState {
  events: TallyEvent[];
  snapshot: ScoreSnapshot;
  addTap: (minutes?: number) => TallyEvent;
  addManual: (at: Date, minutes: number) => TallyEvent;
  updateEvent: (event: TallyEvent) => boolean;
  deleteEvent: (id: string) => void;
  deletePositions: (positions: Iterable<number>, order?: EventOrder) => void;
  clearAll: () => void;
  refresh: (now?: Date) => ScoreSnapshot;
}

export type TrackerStoreDeps = {
  eventStore: EventStore;
  scoreModel: ScoreModel;
  preferences?: TapPreferences;
  clock?: () => Date;
};

export const createTrackerStore = ({
  eventStore,
  scoreModel,
  preferences,
  clock = () => new Date(),
}: TrackerStoreDeps) => {
  const derive = (now: Date) => {
    const events = eventStore.list();
    return { events, snapshot: scoreModel.recompute(now, events) };
  };

  const stateCreator: StateCreator<TrackerState> = (set) => {
    const commit = () => set(derive(clock()));

    return {
      ...derive(clock()),

      addTap: (minutes) => {
        const event = eventStore.add(
          minutes ?? preferences?.getDefaultTapMinutes() ?? 0,
        );
        commit();
        return event;
      },

      addManual: (at, minutes) => {
        const event = eventStore.add(minutes, at);
        commit();
        return event;
      },

      updateEvent: (event) => {
        const updated = eventStore.update(event);
        if (updated) {
          commit();
        }
        return updated;
      },

      deleteEvent: (id) => {
        eventStore.deleteById(id);
        commit();
      },

      deletePositions: (positions, order) => {
        eventStore.deleteByPositions(positions, order);
        commit();
      },

      clearAll: () => {
        eventStore.clearAll();
        commit();
      },

      refresh: (now) => {
        const next = derive(now ?? clock());
        set(next);
        return next.snapshot;
      },
    };
  };

  return createStore<TrackerState>(stateCreator);
};

export type TrackerStore = ReturnType<typeof createTrackerStore>;
