import React, { useState, useEffect } from 'react';
import { Text } from 'ink';
import { formatDuration } from '../format.js';

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const TICK_MS = 80;

interface SpinnerProps {
  label: string;
  /** Epoch ms the work began; adds an elapsed-time suffix */
  since?: number;
}

export function Spinner({ label, since }: SpinnerProps) {
  const [tick, setTick] = useState(0);

  useEffect(() => {
    const timer = setInterval(() => setTick((t) => t + 1), TICK_MS);
    return () => clearInterval(timer);
  }, []);

  return (
    <Text>
      <Text color="cyan">{FRAMES[tick % FRAMES.length]}</Text>
      <Text> {label}</Text>
      {since !== undefined && <Text color="gray"> ({formatDuration(Date.now() - since)})</Text>}
    </Text>
  );
}
