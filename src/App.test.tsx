import { describe, it, expect, vi } from 'vitest';
import { fireEvent, render, screen } from '@testing-library/react';
import App from './App';
import { createHomeRuntime } from './store/homeRuntime';
import { createHomeConfig } from './config/homeConfig';
import { parseCatalog, toGameData } from './utils/gameCatalog';

const catalog = parseCatalog([
  { title: 'Alpha', uuid: 'a' },
  { title: 'Bravo', uuid: 'b', launchOptions: ['--windowed'] },
  { title: 'Charlie', uuid: 'c' },
]);

function renderApp() {
  const runtime = createHomeRuntime(createHomeConfig(), catalog.map(toGameData));
  const utils = render(<App catalog={catalog} runtime={runtime} />);
  const element = (selector: string) => {
    const found = utils.container.querySelector(selector);
    if (!(found instanceof HTMLElement)) throw new Error(`${selector} not rendered`);
    return found;
  };
  const click = (focusId: string) => fireEvent.click(element(`[data-focus-id="${focusId}"]`));
  const tileIds = () =>
    Array.from(utils.container.querySelectorAll('[data-focus-id^="GAME@"]'), tile => tile.getAttribute('data-focus-id'));
  return { ...utils, runtime, element, click, tileIds };
}

describe('App', () => {
  it('shows the whole catalogue first', () => {
    const { tileIds } = renderApp();
    expect(tileIds()).toEqual(['GAME@a', 'GAME@b', 'GAME@c']);
  });

  it('records launches and lists them under recently played', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { click, tileIds } = renderApp();

    click('GAME@b');
    click('GAME@a');
    expect(log).toHaveBeenCalledWith('[App] 启动游戏: Bravo (b)', ['--windowed']);
    expect(localStorage.getItem('recentlyPlayed')).toBe('["a","b"]');

    click('BTN@RECENTLY_PLAYED');
    expect(tileIds()).toEqual(['GAME@a', 'GAME@b']);

    click('BTN@GAMES');
    expect(tileIds()).toEqual(['GAME@a', 'GAME@b', 'GAME@c']);
  });

  it('shows a message when nothing was played', () => {
    const { click } = renderApp();
    click('BTN@RECENTLY_PLAYED');
    expect(screen.getByText('Nothing played recently')).toBeTruthy();
  });

  it('returns to the full list on cancel', () => {
    const { click, tileIds } = renderApp();
    click('BTN@RECENTLY_PLAYED');
    fireEvent.keyDown(window, { key: 'Escape' });
    expect(tileIds()).toEqual(['GAME@a', 'GAME@b', 'GAME@c']);
  });

  it('opens settings and comes back with focus kept', () => {
    const { click, element, runtime } = renderApp();
    click('BTN@SETTINGS');
    fireEvent.click(element('[data-item-id="back"]'));

    expect(element('[data-focus-id="BTN@SETTINGS"]')).toBeTruthy();
    expect(runtime.focusStore.getState().focusedId).toBe('BTN@GAMES');
  });
});
