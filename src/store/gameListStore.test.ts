import { describe, it, expect, vi } from 'vitest';
import { createGameListStore } from './gameListStore';

describe('gameListStore', () => {
  it('keeps insertion order and duplicates', () => {
    const store = createGameListStore();
    const games = [
      { title: 'Zeta', uuid: 'z' },
      { title: 'Alpha', uuid: 'a' },
      { title: 'Zeta again', uuid: 'z' },
    ];
    store.getState().replaceGames(games);
    expect(store.getState().games.map((g) => g.title)).toEqual(['Zeta', 'Alpha', 'Zeta again']);
  });

  it('notifies subscribers on wholesale replacement', () => {
    const store = createGameListStore([{ title: 'Alpha', uuid: 'a' }]);
    const listener = vi.fn();
    store.subscribe((state) => state.games, listener);
    store.getState().replaceGames([]);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(store.getState().games).toEqual([]);
  });
});
