import ShelfApp from './ShelfApp';
import type { ShelfRuntime } from '../main/main';
import './App.css';

export interface AppProps {
  runtime: Pick<ShelfRuntime, 'store' | 'navigation' | 'dragOut' | 'config'>;
  resolveDroppedFile?: (file: File) => string | null;
}

export default function App({ runtime, resolveDroppedFile }: AppProps) {
  return (
    <div className="App">
      <ShelfApp
        store={runtime.store}
        navigation={runtime.navigation}
        dragOut={runtime.dragOut}
        config={runtime.config}
        resolveDroppedFile={resolveDroppedFile}
      />
    </div>
  );
}
