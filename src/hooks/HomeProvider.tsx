/**
 * 首页 Provider 组件
 */

import { HomeContext } from './HomeContext';
import type { HomeRuntime } from '../store/homeRuntime';

export function HomeProvider({
  children,
  value
}: {
  children: React.ReactNode;
  value: HomeRuntime;
}) {
  return (
    <HomeContext.Provider value={value}>
      {children}
    </HomeContext.Provider>
  );
}
