/** Block headers whose bodies run later, after the caller may have gone away. */
export const ASYNC_CALLBACK =
  /\b(?:onResponse|onFailure|onSuccess|onError|onComplete|onNext|subscribe|enqueue|postDelayed|Runnable|addOn\w*Listener|observeForever|launch|async|thread|Thread|Handler|Timer|schedule|run)\b/;

/** Framework callbacks that run on the main thread. */
export const UI_METHOD =
  /^(?:onCreate|onStart|onResume|onPause|onStop|onDestroy|onCreateView|onViewCreated|onActivityCreated|onClick|onLongClick|onItemClick|onItemSelected|onTouch|onOptionsItemSelected|onBindViewHolder|onCreateViewHolder|onReceive|onCheckedChanged|onTextChanged|afterTextChanged|onNewIntent|onActivityResult|onRequestPermissionsResult|onWindowFocusChanged|onConfigurationChanged)$/;

/** Listener blocks declared inline; their bodies also run on the main thread. */
export const UI_LISTENER = /\bsetOn\w+Listener\b|\baddTextChangedListener\b|\brunOnUiThread\b/;

/** Block headers that move their body off the main thread. */
export const BACKGROUND_THREAD =
  /\bthread\s*(?:\([^)]*\)\s*)?\{|\bThread\s*[({]|\bnew\s+Thread\b|\bdoInBackground\b|Dispatchers\.(?:IO|Default)|\bexecute\s*\{|\bsubmit\s*\{|\bexecutor\w*\.(?:execute|submit)\s*\(|Executors\.\w+\([^)]*\)\.(?:execute|submit)|\bdoWork\b|\bsubscribeOn\b/i;

/** Block headers that hop back onto the main thread. */
export const MAIN_THREAD_HOP =
  /\brunOnUiThread\b|\.post\s*[({]|\bpostDelayed\b|Dispatchers\.Main|\bonPostExecute\b|\bonProgressUpdate\b|Looper\.getMainLooper|AndroidSchedulers\.mainThread/;

export const TEARDOWN_METHOD = /^(?:onPause|onStop|onSaveInstanceState|onDestroy|onDestroyView|onDetach|onCleared)$/;

export const FRAGMENT_CLASS =
  /(?:\bextends\s+|:\s*)(?:[\w.]+\.)?(?:Fragment|DialogFragment|BottomSheetDialogFragment|PreferenceFragmentCompat|ListFragment)\b/;

export const CONSTANT_NAME = /^(?:[\w]+\.)*[A-Z][A-Z0-9_]*$/;
