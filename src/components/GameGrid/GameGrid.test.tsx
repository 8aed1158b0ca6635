import { describe, it, expect, vi } from 'vitest';
import { act, fireEvent, render, screen } from '@testing-library/react';
import { GameGrid } from './GameGrid';
import { HomeProvider } from '../../hooks/HomeProvider';
import { createHomeRuntime } from '../../store/homeRuntime';
import { createHomeConfig } from '../../config/homeConfig';
import type { GameData } from '../../types/launcher';

const makeGames = (count: number): GameData[] =>
  Array.from({ length: count }, (_, i) => ({ title: `Game ${i}`, uuid: `g${i}` }));

const viewport = { width: 700, height: 300 };

function renderGrid(games: GameData[]) {
  const runtime = createHomeRuntime(createHomeConfig(), games);
  const utils = render(
    <HomeProvider value={runtime}>
      <GameGrid viewport={viewport} />
    </HomeProvider>
  );
  const tile = (uuid: string) => {
    const element = utils.container.querySelector(`[data-focus-id="GAME@${uuid}"]`);
    if (!(element instanceof HTMLElement)) throw new Error(`tile ${uuid} not rendered`);
    return element;
  };
  return { ...utils, runtime, tile };
}

describe('GameGrid', () => {
  it('renders one tile per game', () => {
    const { container } = renderGrid(makeGames(9));
    expect(container.querySelectorAll('[data-focus-id^="GAME@"]')).toHaveLength(9);
    expect(screen.getByText('Game 8')).toBeTruthy();
  });

  it('places tiles on a seven column grid', () => {
    const { tile } = renderGrid(makeGames(9));
    const last = tile('g8');
    expect(last.style.left).toBe('100px');
    expect(last.style.top).toBe('100px');
    expect(last.style.width).toBe('100px');
    expect(last.style.height).toBe('100px');
  });

  it('sizes the content for full rows plus padding', () => {
    renderGrid(makeGames(9));
    expect(screen.getByTestId('game-grid-content').style.height).toBe('300px');
  });

  it('marks only the focused tile', () => {
    const { runtime, tile } = renderGrid(makeGames(5));
    act(() => runtime.focusStore.getState().setFocus('GAME@g3'));
    expect(tile('g3').dataset.focused).toBe('true');
    expect(tile('g2').dataset.focused).toBe('false');
  });

  it('launches the clicked game without moving focus', () => {
    const { runtime, tile } = renderGrid(makeGames(5));
    act(() => runtime.focusStore.getState().setFocus('GAME@g1'));
    const listener = vi.fn();
    runtime.dispatcher.onActivation(listener);

    fireEvent.click(tile('g4'));

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ kind: 'launch', uuid: 'g4' });
    expect(runtime.focusStore.getState().focusedId).toBe('GAME@g1');
  });

  it('follows list replacements', () => {
    const { runtime, container } = renderGrid(makeGames(3));
    act(() => runtime.gameListStore.getState().replaceGames(makeGames(8)));
    expect(container.querySelectorAll('[data-focus-id^="GAME@"]')).toHaveLength(8);
  });

  it('shows a message when there are no games', () => {
    renderGrid([]);
    expect(screen.getByText('No games in your library yet')).toBeTruthy();
  });
});
