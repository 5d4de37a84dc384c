import { Box, Text, useApp, useInput, useStdout } from "ink";
import { useCallback, useEffect, useState, useSyncExternalStore } from "react";

import { describeError } from "../platform/errors.js";
import type { CatalogEntry, CatalogStore } from "./catalog.js";
import {
  editorOptionString,
  handleEditorKey,
  openEditor,
  type EditorState,
} from "./editor.js";
import { formatValue, isConfigurable, schemaFor, type OptionSpec } from "./options.js";
import {
  handleListKey,
  initialSelectorState,
  LIST_PANE_RATIO,
  listWindow,
  withStatus,
  wrapText,
  type SelectorState,
} from "./selector-state.js";
import type { SelectorServices } from "./services.js";

export const TITLE = "Screensaver Configuration Tool";
export const FOOTER =
  "Nav: ↑↓hjkl PgUp/PgDn gg/G Ctrl+U/D | Select: ENTER | Config: C | Preview: P | Restore Default: R | Quit: Q";
export const NOT_CONFIGURABLE = "No configuration options available for this screensaver.";

export const MOUSE_ON = "\x1b[?1003h\x1b[?1006h";
export const MOUSE_OFF = "\x1b[?1003l\x1b[?1006l";

export const describeRange = (spec: OptionSpec): string => {
  switch (spec.kind) {
    case "float":
    case "int":
      return `${spec.min} - ${spec.max}`;
    case "enum":
      return spec.choices.join("/");
    case "string":
      return "text";
  }
};

const ListPane = ({
  entries,
  state,
  width,
}: {
  entries: readonly CatalogEntry[];
  state: SelectorState;
  width: number;
}) => {
  const { start, end } = listWindow(state.selected, entries.length);
  return (
    <Box width={width} borderStyle="single" flexDirection="column" paddingX={1}>
      <Text bold>{TITLE}</Text>
      {entries.slice(start, end).map((entry, offset) => {
        const index = start + offset;
        return (
          <Text key={entry.key} inverse={index === state.selected} wrap="truncate">
            {`${index + 1}. ${entry.icon} ${entry.key}`}
          </Text>
        );
      })}
    </Box>
  );
};

const DetailPane = ({
  entry,
  options,
  width,
}: {
  entry: CatalogEntry;
  options: string;
  width: number;
}) => {
  const configured = options.length > 0 ? " [CONFIGURED]" : "";
  return (
    <Box flexGrow={1} borderStyle="single" flexDirection="column" paddingX={1}>
      <Text color="yellow" bold>{`${entry.icon} ${entry.key} ${entry.title}${configured}`}</Text>
      <Text> </Text>
      {wrapText(entry.description, Math.max(1, width - 4)).map((line, i) => (
        <Text key={i}>{line}</Text>
      ))}
      <Text> </Text>
      {options.length > 0 ? <Text>{`Options: ${options}`}</Text> : null}
      <Text dimColor>
        {isConfigurable(entry.key) ? "(Configurable with C key)" : "(Non-configurable)"}
      </Text>
    </Box>
  );
};

const EditorPane = ({ entry, editor }: { entry: CatalogEntry; editor: EditorState }) => (
  <Box borderStyle="single" flexDirection="column" paddingX={1}>
    <Text bold>{`Configure: ${entry.icon} ${entry.key}`}</Text>
    <Text> </Text>
    {editor.specs.map((spec, i) => (
      <Text key={spec.flag} inverse={i === editor.cursor}>
        {`${spec.name}: ${formatValue(spec, editor.values[i])}  (${describeRange(spec)})  ${spec.description}`}
      </Text>
    ))}
    <Text> </Text>
    {editor.draft !== null ? <Text color="yellow">{`Text: ${editor.draft}_`}</Text> : null}
    <Text>{`Options: ${editorOptionString(editor)}`}</Text>
    <Text dimColor>↑↓ Select | +/- Adjust | ENTER Edit text | S Save | ESC Cancel</Text>
  </Box>
);

export interface SelectorAppProps {
  readonly store: CatalogStore;
  readonly services: SelectorServices;
  /** Key to highlight first, usually the one the hook runs. */
  readonly initialKey?: string;
}

export const SelectorApp = ({ store, services, initialKey }: SelectorAppProps) => {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const snapshot = useSyncExternalStore(store.subscribe, store.getSnapshot);
  const entries = snapshot.entries;
  const [state, setState] = useState<SelectorState>(() =>
    initialSelectorState(
      entries.length,
      Math.max(
        0,
        entries.findIndex((entry) => entry.key === initialKey),
      ),
    ),
  );
  const [editor, setEditor] = useState<EditorState | null>(null);
  const columns = stdout.columns || 80;
  const listWidth = Math.floor(columns * LIST_PANE_RATIO);

  useEffect(() => {
    stdout.write(MOUSE_ON);
    return () => {
      stdout.write(MOUSE_OFF);
    };
  }, [stdout]);

  const report = useCallback((task: Promise<void>, success: string) => {
    task
      .then(() => setState((current) => withStatus(current, success)))
      .catch((error: unknown) =>
        setState((current) => withStatus(current, `Error: ${describeError(error)}`)),
      );
  }, []);

  const selectedEntry = entries[state.selected];

  useInput((input, key) => {
    if (!selectedEntry) {
      if (input === "q" || key.escape) {
        exit();
      }
      return;
    }
    if (editor) {
      const outcome = handleEditorKey(editor, input, key);
      if (outcome.command === "save") {
        store.setOptions(editor.key, editorOptionString(outcome.state));
        setEditor(null);
        setState((current) => withStatus(current, `Saved options for ${editor.key}`));
      } else if (outcome.command === "cancel") {
        setEditor(null);
      } else {
        setEditor(outcome.state);
      }
      return;
    }
    const outcome = handleListKey(state, input, key, columns);
    setState(outcome.state);
    const options = store.getOptions(selectedEntry.key);
    switch (outcome.command) {
      case "commit":
        report(services.commit(selectedEntry.key, options), `Selected: ${selectedEntry.key}`);
        break;
      case "configure": {
        const specs = schemaFor(selectedEntry.key);
        if (specs.length === 0) {
          setState(withStatus(outcome.state, NOT_CONFIGURABLE));
        } else {
          setEditor(openEditor(selectedEntry.key, specs, options));
        }
        break;
      }
      case "preview":
        report(services.preview(selectedEntry.key, options), `Previewing: ${selectedEntry.key}`);
        break;
      case "restore":
        report(services.restoreDefault(), "Restored: Default screensaver");
        break;
      case "quit":
        exit();
        break;
      case null:
        break;
    }
  });

  if (!selectedEntry) {
    return <Text>No screensavers installed.</Text>;
  }

  return (
    <Box flexDirection="column">
      {editor ? (
        <EditorPane entry={selectedEntry} editor={editor} />
      ) : (
        <Box>
          <ListPane entries={entries} state={state} width={listWidth} />
          <DetailPane
            entry={selectedEntry}
            options={store.getOptions(selectedEntry.key)}
            width={columns - listWidth}
          />
        </Box>
      )}
      <Text wrap="truncate">{FOOTER}</Text>
      <Text color="yellow">{state.status ?? " "}</Text>
    </Box>
  );
};
