/**
 * Browser backend - the slice of a browser-automation library the tracker drives
 */

export interface BrowserBackend {
  /** Create an isolated browser context for a session; returns its id */
  createContext(sessionId: string): Promise<string>;
  /** Open a page in a context; returns its id */
  openPage(contextId: string): Promise<string>;
  closePage(pageId: string): Promise<void>;
  /** Close a context and every page still in it */
  closeContext(contextId: string): Promise<void>;
  isConnected(): boolean;
  /** Called when the connection to the browser drops */
  addDisconnectListener?(listener: () => void): void;
}
