/**
 * 焦点指示器组件
 * 包裹可聚焦元素：自己订阅焦点状态，点击时分发自己的标识
 */

import { forwardRef } from 'react';
import { motion } from 'framer-motion';
import { useHome, useIsFocused } from '../../hooks/useHome';
import type { FocusId } from '../../types/launcher';
import styles from './FocusIndicator.module.css';

interface FocusIndicatorProps {
  /** 元素的焦点标识，也是激活时分发的标识 */
  focusId: FocusId;
  children: React.ReactNode;
  className?: string;
  style?: React.CSSProperties;
  /** 焦点样式 */
  variant?: 'outline' | 'glow' | 'scale';
  label?: string;
}

export const FocusIndicator = forwardRef<HTMLButtonElement, FocusIndicatorProps>(
  function FocusIndicator(
    {
      focusId,
      children,
      className = '',
      style,
      variant = 'outline',
      label,
    },
    ref
  ) {
    const { dispatcher } = useHome();
    const focused = useIsFocused(focusId);

    return (
      <motion.button
        ref={ref}
        type="button"
        className={`${styles.wrapper} ${styles[variant]} ${focused ? styles.focused : ''} ${className}`}
        style={style}
        // click 本身只在按下和抬起都在元素内时触发
        onClick={() => dispatcher.dispatch(focusId)}
        whileHover={{ scale: variant === 'scale' ? 1.03 : 1 }}
        whileTap={{ scale: 0.97 }}
        animate={{ scale: focused && variant === 'scale' ? 1.05 : 1 }}
        transition={{ duration: 0.15 }}
        // 焦点由焦点状态管理，不参与浏览器 Tab 顺序
        tabIndex={-1}
        aria-label={label}
        aria-current={focused ? 'true' : undefined}
        data-focus-id={focusId}
        data-focused={focused ? 'true' : 'false'}
      >
        {children}
        {variant === 'glow' && focused && (
          <motion.div
            className={styles.glowEffect}
            initial={{ opacity: 0 }}
            animate={{ opacity: 1 }}
          />
        )}
      </motion.button>
    );
  }
);
