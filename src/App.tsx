/**
 * 游戏启动器主应用
 * 持有首页运行时，对每种激活事件做穷尽处理
 */

import { useState, useEffect, useCallback } from 'react';
import { useTranslation } from 'react-i18next';
import { Home } from './pages/Home';
import { Settings, readTheme, VIBRATION_KEY } from './pages/Settings';
import { HomeProvider } from './hooks/HomeProvider';
import { useInputMode } from './hooks/useInputMode';
import { createHomeRuntime, type HomeRuntime } from './store/homeRuntime';
import { createHomeConfig } from './config/homeConfig';
import { gamepadService } from './services/gamepadService';
import {
  parseCatalog,
  recordRecentlyPlayed,
  selectRecentGames,
  toGameData,
} from './utils/gameCatalog';
import type { Activation, GameMetadata } from './types/launcher';
import catalogJson from './data/games.json';

// 导入i18n配置
import './i18n';

// 导入全局样式
import './styles/global.css';

type AppPage = 'home' | 'settings';
type HomeView = 'GAMES' | 'RECENTLY_PLAYED';

const RECENT_KEY = 'recentlyPlayed';

function loadRecent(): string[] {
  const saved = localStorage.getItem(RECENT_KEY);
  if (!saved) return [];
  try {
    const parsed: unknown = JSON.parse(saved);
    return Array.isArray(parsed) ? parsed.filter((id): id is string => typeof id === 'string') : [];
  } catch (e) {
    console.warn('[App] 最近游玩记录已损坏，已重置:', e);
    return [];
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled activation: ${JSON.stringify(value)}`);
}

interface AppProps {
  catalog?: readonly GameMetadata[];
  runtime?: HomeRuntime;
}

const defaultCatalog = (): GameMetadata[] => parseCatalog(catalogJson);

function App({ catalog: catalogProp, runtime: runtimeProp }: AppProps = {}) {
  const { t } = useTranslation();
  useInputMode();

  const [catalog] = useState<readonly GameMetadata[]>(() => catalogProp ?? defaultCatalog());
  const [runtime] = useState<HomeRuntime>(
    () => runtimeProp ?? createHomeRuntime(createHomeConfig(), catalog.map(toGameData))
  );
  const [currentPage, setCurrentPage] = useState<AppPage>('home');
  const [view, setView] = useState<HomeView>('GAMES');
  const [recent, setRecent] = useState<string[]>(loadRecent);

  // 初始化主题（默认深色模式）
  useEffect(() => {
    document.documentElement.setAttribute('data-theme', readTheme());
  }, []);

  // 加载震动设置并启动手柄服务
  useEffect(() => {
    const savedVibration = localStorage.getItem(VIBRATION_KEY);
    if (savedVibration !== null) {
      gamepadService.setVibrationEnabled(savedVibration === 'true');
    }
    gamepadService.configure(runtime.config.input);
    gamepadService.start();
  }, [runtime]);

  useEffect(() => {
    localStorage.setItem(RECENT_KEY, JSON.stringify(recent));
  }, [recent]);

  // 当前视图对应的游戏列表
  useEffect(() => {
    const games = view === 'GAMES' ? catalog : selectRecentGames(catalog, recent);
    runtime.gameListStore.getState().replaceGames(games.map(toGameData));
  }, [catalog, recent, runtime, view]);

  const launchGame = useCallback((uuid: string) => {
    const game = catalog.find(entry => entry.uuid === uuid);
    if (!game) {
      console.warn(`[App] 目录中没有该游戏: ${uuid}`);
      return;
    }
    console.log(`[App] 启动游戏: ${game.title} (${uuid})`, game.launchOptions);
    setRecent(prev => recordRecentlyPlayed(prev, uuid));
  }, [catalog]);

  const handleActivation = useCallback((activation: Activation) => {
    switch (activation.kind) {
      case 'button':
        switch (activation.button) {
          case 'GAMES':
            setView('GAMES');
            return;
          case 'RECENTLY_PLAYED':
            setView('RECENTLY_PLAYED');
            return;
          case 'SETTINGS':
            setCurrentPage('settings');
            return;
          default:
            return assertNever(activation.button);
        }
      case 'launch':
        launchGame(activation.uuid);
        return;
      default:
        return assertNever(activation);
    }
  }, [launchGame]);

  useEffect(() => runtime.dispatcher.onActivation(handleActivation), [runtime, handleActivation]);

  // 根据当前页面渲染内容
  const renderPage = () => {
    switch (currentPage) {
      case 'home':
        return (
          <Home
            activeView={view}
            emptyText={view === 'RECENTLY_PLAYED' ? t('home.emptyRecent') : undefined}
            onCancel={() => setView('GAMES')}
          />
        );
      case 'settings':
        return <Settings onBack={() => setCurrentPage('home')} />;
    }
  };

  return (
    <HomeProvider value={runtime}>
      <div className="app">
        {renderPage()}
      </div>
    </HomeProvider>
  );
}

export default App;
