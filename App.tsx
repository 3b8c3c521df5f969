import React, { useState, useEffect, useRef } from 'react';
import { StepIndicator, type Step } from './components/StepIndicator';
import { FileUploader } from './components/FileUploader';
import { RowTable } from './components/RowTable';
import { SummaryChart } from './components/SummaryChart';
import type { CompareOptions, ComparisonReport, Dataset, Row } from './types';
import { toDataTable } from './utils';
import { compareDatasets, resolveKeys, DEFAULT_COMPARE_OPTIONS } from './comparator';
import { exportReportWorkbook } from './reportExport';
import { ArrowRight, RefreshCw, FileSpreadsheet, Download, TerminalSquare, AlertCircle, Ban, ShieldCheck, Columns3, KeyRound, Hash, Plus } from 'lucide-react';
import { Button, Card, CardContent, CardDescription, CardHeader, CardTitle, Badge, Input, Toggle, Stat } from './components/ui/Components';

const ROW_SAMPLE_SIZE = 50;
const CELL_DIFF_SAMPLE_SIZE = 200;
const CELL_DIFF_COLUMNS = ['row_key', 'column', 'left', 'right'];

type ResultView = 'only-left' | 'only-right' | 'cell-diffs';

export default function App() {
  const [step, setStep] = useState<Step>('upload');
  const [tableA, setTableA] = useState<Dataset | null>(null); // Source / Left
  const [tableB, setTableB] = useState<Dataset | null>(null); // Target / Right

  const [options, setOptions] = useState<CompareOptions>(DEFAULT_COMPARE_OPTIONS);
  const [report, setReport] = useState<ComparisonReport | null>(null);
  const [isComparing, setIsComparing] = useState(false);
  const [errorMsg, setErrorMsg] = useState('');
  const [processLogs, setProcessLogs] = useState<string[]>([]);
  const logsEndRef = useRef<HTMLDivElement>(null);

  const [resultView, setResultView] = useState<ResultView>('only-left');

  useEffect(() => {
    logsEndRef.current?.scrollIntoView({ behavior: 'smooth' });
  }, [processLogs]);

  const sharedColumns = tableA && tableB
    ? tableA.columns.map(c => c.name).filter(name => tableB.columns.some(c => c.name === name))
    : [];

  const setOption = <K extends keyof CompareOptions>(key: K, value: CompareOptions[K]) => {
    setOptions(prev => ({ ...prev, [key]: value }));
  };

  const addKeyColumn = (name: string) => {
    setOptions(prev => {
      const current = prev.keyColumns.split(',').map(k => k.trim()).filter(Boolean);
      if (current.includes(name)) return prev;
      return { ...prev, keyColumns: [...current, name].join(', ') };
    });
  };

  const addLog = async (msg: string) => {
    setProcessLogs(prev => [...prev, `[${new Date().toLocaleTimeString()}] ${msg}`]);
    // Yield so the log line paints before the next step runs
    await new Promise(resolve => setTimeout(resolve, 50));
  };

  const runCompare = async () => {
    if (!tableA || !tableB) return;
    setIsComparing(true);
    setProcessLogs([]);
    setReport(null);
    setErrorMsg('');
    setStep('results');

    try {
      const left = toDataTable(tableA, options.dropBlankRows);
      const right = toDataTable(tableB, options.dropBlankRows);
      await addLog(`Loaded ${tableA.name} (${left.rows.length} rows) and ${tableB.name} (${right.rows.length} rows).`);
      if (options.dropBlankRows && (left.rows.length < tableA.rowCount || right.rows.length < tableB.rowCount)) {
        await addLog(`Dropped trailing blank rows (${tableA.rowCount - left.rows.length} left, ${tableB.rowCount - right.rows.length} right).`);
      }

      const keys = resolveKeys(left.columns, right.columns, options.keyColumns);
      if (keys) {
        await addLog(`Aligning rows on key columns: ${keys.join(', ')}`);
      } else if (options.keyColumns.trim()) {
        await addLog("None of the key columns exist in both files. Aligning rows by full-row hash.");
      } else {
        await addLog("No key columns given. Aligning rows by full-row hash.");
      }

      await addLog(`Normalizing values (${options.strictDecimal ? 'strict decimals' : 'ignoring trailing zeros'}, ${options.caseInsensitive ? 'case-insensitive' : 'case-sensitive'})...`);
      const result = compareDatasets(left, right, options.keyColumns, options);

      await addLog(`Only in left: ${result.onlyLeftCount}, only in right: ${result.onlyRightCount}, matched keys: ${result.commonKeyCount}.`);
      if (result.cellDiffs) {
        await addLog(`Cell-level differences: ${result.cellDiffCount}.`);
      }
      const dupes = result.duplicateKeys.left.length + result.duplicateKeys.right.length;
      if (dupes > 0) {
        await addLog(`Warning: ${dupes} key value(s) repeat within a file. The first row per key was compared.`);
      }

      setReport(result);
      setResultView(options.showSamples ? 'only-left' : 'cell-diffs');
      await addLog("Comparison complete.");
    } catch (e) {
      console.error("Comparison Error", e);
      setErrorMsg(e instanceof Error ? e.message : String(e));
      await addLog("Comparison failed.");
    } finally {
      setIsComparing(false);
    }
  };

  // --- Render Sections ---

  const renderUploadStep = () => (
    <div className="space-y-8">
      <div className="text-center space-y-2 mb-8 animate-in fade-in slide-in-from-top-4">
        <h2 className="text-2xl font-bold text-slate-800">Data Integrity Report</h2>
        <p className="text-slate-500 max-w-2xl mx-auto text-sm leading-relaxed">
           Compare two CSV or Excel files, see which columns and rows differ, and export a spreadsheet report.
           Rows are matched by key columns when you give them, otherwise by their full content.
        </p>
      </div>

      <div className="grid grid-cols-1 lg:grid-cols-2 gap-8">
        <div className="space-y-4">
          <div>
              <h2 className="text-lg font-bold text-slate-800 flex items-center gap-2">
                  <span className="flex items-center justify-center w-6 h-6 rounded-full bg-slate-900 text-white text-xs">1</span>
                  Source File (Left)
              </h2>
              <p className="text-slate-500 text-xs mt-1 ml-8">The reference data.</p>
          </div>
          <FileUploader
              datasetLabel="Source"
              onDataLoaded={setTableA}
              dataset={tableA}
          />
        </div>

        <div className="space-y-4">
          <div>
              <h2 className="text-lg font-bold text-slate-800 flex items-center gap-2">
                  <span className="flex items-center justify-center w-6 h-6 rounded-full bg-slate-100 text-slate-900 text-xs">2</span>
                  Target File (Right)
              </h2>
              <p className="text-slate-500 text-xs mt-1 ml-8">The data checked against the source.</p>
          </div>
          <FileUploader
              datasetLabel="Target"
              onDataLoaded={setTableB}
              dataset={tableB}
          />
        </div>
      </div>

      <div className="flex justify-center pt-8 border-t border-slate-100">
        <Button
            disabled={!tableA || !tableB}
            onClick={() => setStep('options')}
            size="lg"
            className="w-full md:w-auto px-12 gap-2 shadow-lg shadow-blue-900/10 hover:shadow-blue-900/20 transition-all"
        >
            Choose Options <ArrowRight size={18} />
        </Button>
      </div>
    </div>
  );

  const renderOptionsStep = () => (
    <div className="space-y-6 max-w-4xl mx-auto pb-12">
      <Card>
        <CardHeader>
            <CardTitle>Key Columns</CardTitle>
            <CardDescription>
                Optional, comma-separated. Rows are aligned by these columns; without them every row is matched by its full content.
            </CardDescription>
        </CardHeader>
        <CardContent className="space-y-3">
            <Input
                value={options.keyColumns}
                onChange={e => setOption('keyColumns', e.target.value)}
                placeholder="e.g. id, region"
            />
            {sharedColumns.length > 0 && (
                <div>
                    <h4 className="text-xs font-bold text-slate-500 uppercase mb-2">Columns in both files</h4>
                    <div className="flex flex-wrap gap-1.5">
                        {sharedColumns.map(name => (
                            <button
                                key={name}
                                onClick={() => addKeyColumn(name)}
                                className="px-2 py-1 text-xs rounded border bg-white text-slate-600 border-slate-200 hover:border-slate-300 inline-flex items-center gap-1"
                            >
                                <Plus size={10} /> {name}
                            </button>
                        ))}
                    </div>
                </div>
            )}
        </CardContent>
      </Card>

      <Card>
        <CardHeader>
            <CardTitle>Options</CardTitle>
        </CardHeader>
        <CardContent className="grid grid-cols-1 md:grid-cols-2 gap-3">
            <Toggle
                label="Strict decimal comparison"
                hint="Do not ignore trailing zeros (5.0 and 5 differ)."
                checked={options.strictDecimal}
                onChange={v => setOption('strictDecimal', v)}
            />
            <Toggle
                label="Case-insensitive string compare"
                checked={options.caseInsensitive}
                onChange={v => setOption('caseInsensitive', v)}
            />
            <Toggle
                label="Drop trailing blank rows"
                checked={options.dropBlankRows}
                onChange={v => setOption('dropBlankRows', v)}
            />
            <Toggle
                label="Show sample rows of each diff"
                checked={options.showSamples}
                onChange={v => setOption('showSamples', v)}
            />
        </CardContent>
      </Card>

      <div className="flex justify-between pt-6 border-t border-slate-200">
        <Button variant="ghost" onClick={() => setStep('upload')}>Back</Button>
        <Button
            onClick={() => void runCompare()}
            disabled={!tableA || !tableB || isComparing}
            size="lg"
            className="w-40"
        >
            Compare
        </Button>
      </div>
    </div>
  );

  const renderColumnList = (title: string, columns: string[]) => (
    <div>
      <h4 className="text-xs font-bold text-slate-500 uppercase mb-2">{title}</h4>
      {columns.length === 0
        ? <p className="text-xs text-slate-400 italic">None</p>
        : (
          <div className="flex flex-wrap gap-1.5">
            {columns.map(c => <Badge key={c} variant="outline">{c}</Badge>)}
          </div>
        )}
    </div>
  );

  const renderResultsStep = () => {
    const cellDiffRows: Row[] = (report?.cellDiffs ?? []).map(d => ({ row_key: d.rowKey, column: d.column, left: d.left, right: d.right }));
    const showCellDiffs = !!report && report.cellDiffCount > 0;

    const tabs: { id: ResultView; label: React.ReactNode; visible: boolean }[] = report ? [
      { id: 'only-left', label: <><AlertCircle size={14} className="inline mr-1" /> Only in Left ({report.onlyLeftCount})</>, visible: options.showSamples },
      { id: 'only-right', label: <><Ban size={14} className="inline mr-1" /> Only in Right ({report.onlyRightCount})</>, visible: options.showSamples },
      { id: 'cell-diffs', label: <><Columns3 size={14} className="inline mr-1" /> Cell Differences ({report.cellDiffCount})</>, visible: showCellDiffs },
    ] : [];
    const visibleTabs = tabs.filter(t => t.visible);
    const activeView = visibleTabs.some(t => t.id === resultView) ? resultView : visibleTabs[0]?.id;

    return (
      <div className="space-y-6 pb-12">
         {/* Process Log */}
         <Card className="bg-slate-900 border-slate-800 text-slate-300 overflow-hidden shadow-xl">
             <div className="p-3 border-b border-slate-800 flex items-center gap-2">
                 <TerminalSquare size={16} />
                 <span className="text-xs font-mono font-bold text-slate-400">System Log</span>
                 {isComparing && <RefreshCw size={12} className="animate-spin ml-auto" />}
             </div>
             <div className="p-4 font-mono text-xs h-32 overflow-y-auto custom-scrollbar flex flex-col gap-1">
                 {processLogs.length === 0 && <span className="text-slate-600 italic">Ready...</span>}
                 {processLogs.map((log, i) => (
                     <div key={i} className="animate-in fade-in slide-in-from-left-2 duration-300">
                         <span className="text-slate-500">{log.split(']')[0]}]</span>
                         <span className="text-green-400">{log.slice(log.indexOf(']') + 1)}</span>
                     </div>
                 ))}
                 <div ref={logsEndRef} />
             </div>
         </Card>

         {errorMsg && (
            <div className="p-3 bg-red-50 border border-red-200 rounded-md flex items-start gap-2">
                <AlertCircle size={16} className="text-red-500 mt-0.5 shrink-0" />
                <span className="text-sm text-red-600">Error: {errorMsg}</span>
            </div>
         )}

         {!isComparing && report && (
           <>
             {/* KPI Cards */}
             <div className="grid grid-cols-2 md:grid-cols-4 gap-4 animate-in fade-in slide-in-from-bottom-4">
                 <Stat label="Left rows" value={report.leftRows} />
                 <Stat label="Right rows" value={report.rightRows} />
                 <Stat label="Only in Left" value={report.onlyLeftCount} tone={report.onlyLeftCount ? 'danger' : 'success'} />
                 <Stat label="Only in Right" value={report.onlyRightCount} tone={report.onlyRightCount ? 'warning' : 'success'} />
             </div>

             <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
                 <Card>
                     <CardHeader>
                         <CardTitle>Column differences</CardTitle>
                         <CardDescription>
                             {report.keyColumns
                               ? <span className="inline-flex items-center gap-1"><KeyRound size={12} /> Aligned on {report.keyColumns.join(', ')}</span>
                               : <span className="inline-flex items-center gap-1"><Hash size={12} /> Aligned by full-row hash</span>}
                         </CardDescription>
                     </CardHeader>
                     <CardContent className="space-y-4">
                         {renderColumnList('Missing in Right', report.missingColumnsInRight)}
                         {renderColumnList('New in Right', report.newColumnsInRight)}
                         {(report.duplicateKeys.left.length > 0 || report.duplicateKeys.right.length > 0) && (
                            <div className="p-3 bg-amber-50 border border-amber-200 rounded-md text-xs text-amber-800">
                                Repeated keys: {report.duplicateKeys.left.length} in left, {report.duplicateKeys.right.length} in right.
                                Cell differences use the first row for each key.
                            </div>
                         )}
                     </CardContent>
                 </Card>
                 <Card>
                     <CardHeader>
                         <CardTitle>Summary</CardTitle>
                     </CardHeader>
                     <CardContent>
                         <SummaryChart report={report} />
                     </CardContent>
                 </Card>
             </div>

             <Card className="overflow-hidden animate-in fade-in slide-in-from-bottom-8 border-slate-200 shadow-md">
                 <div className="border-b border-slate-200 bg-slate-50">
                     <div className="flex px-4 pt-4 gap-1">
                         {visibleTabs.map(tab => (
                             <button
                                key={tab.id}
                                onClick={() => setResultView(tab.id)}
                                className={`px-4 py-2 text-sm font-medium rounded-t-lg transition-colors border-t border-x ${activeView === tab.id ? 'bg-white text-slate-900 border-slate-200 border-b-white translate-y-[1px]' : 'bg-transparent text-slate-500 border-transparent hover:text-slate-700 hover:bg-slate-100'}`}
                             >
                                 {tab.label}
                             </button>
                         ))}
                     </div>

                     <div className="p-3 border-t border-slate-200 flex justify-end items-center bg-white px-4 gap-2">
                        <Button variant="primary" size="sm" onClick={() => exportReportWorkbook(report)}>
                            <Download size={14} className="mr-1" /> Download Excel Report
                        </Button>
                     </div>
                 </div>

                 {activeView === 'only-left' && (
                     <RowTable rows={report.onlyLeft} columns={report.leftColumns} pageSize={ROW_SAMPLE_SIZE} keyColumns={report.keyColumns ?? []} exportName="only-in-left.csv" emptyMessage="Every left row has a match on the right." />
                 )}
                 {activeView === 'only-right' && (
                     <RowTable rows={report.onlyRight} columns={report.rightColumns} pageSize={ROW_SAMPLE_SIZE} keyColumns={report.keyColumns ?? []} exportName="only-in-right.csv" emptyMessage="Every right row has a match on the left." />
                 )}
                 {activeView === 'cell-diffs' && (
                     <RowTable rows={cellDiffRows} columns={CELL_DIFF_COLUMNS} pageSize={CELL_DIFF_SAMPLE_SIZE} exportName="cell-diffs.csv" />
                 )}
                 {!activeView && (
                     <p className="p-6 text-center text-sm text-slate-400 italic">Row samples are hidden.</p>
                 )}
             </Card>
           </>
         )}

        {!isComparing && (
             <div className="flex justify-center pt-8">
                <Button variant="ghost" onClick={() => setStep('options')}>Adjust Options</Button>
             </div>
         )}
      </div>
    );
  };

  return (
    <div className="min-h-screen bg-slate-50/50 text-slate-900 pb-20 font-sans flex flex-col">
      <header className="bg-white border-b border-slate-200 sticky top-0 z-50">
        <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8">
            <div className="flex justify-between items-center h-16">
                <div className="flex items-center gap-2">
                    <div className="bg-slate-900 text-white p-1.5 rounded-lg shadow-sm">
                        <FileSpreadsheet size={20} className="text-white" />
                    </div>
                    <h1 className="text-lg font-bold tracking-tight text-slate-900">
                        CSV Compare
                    </h1>
                </div>
                <div className="hidden md:flex items-center gap-2 text-[10px] bg-green-50 text-green-700 px-3 py-1.5 rounded-full border border-green-100">
                    <ShieldCheck size={12} />
                    <span className="font-medium">Client-Side Processing • No Data Stored</span>
                </div>
            </div>
        </div>
      </header>

      <StepIndicator
        currentStep={step}
        onStepChange={setStep}
        canNavigate={!!tableA && !!tableB}
      />

      <main className="flex-grow max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 mt-8 w-full animate-in fade-in slide-in-from-bottom-4 duration-500">
        {step === 'upload' && renderUploadStep()}
        {step === 'options' && renderOptionsStep()}
        {step === 'results' && renderResultsStep()}
      </main>

      <footer className="mt-auto py-8 border-t border-slate-200 bg-white">
          <div className="max-w-7xl mx-auto px-4 text-[10px] text-slate-400 text-center md:text-left">
              All file processing happens locally in your browser. Nothing is uploaded or stored.
          </div>
      </footer>
    </div>
  );
}
