import { expect } from 'chai';
import {
  MultilineConstructTracker,
  isPodCut,
} from '../../src/source/multilineTracker';

describe('MultilineConstructTracker', () => {
  it('closes documentation only on =cut', () => {
    const tracker = new MultilineConstructTracker();
    tracker.enterDocumentation(3);
    expect(tracker.inDocumentation).to.equal(true);
    expect(tracker.consumeDocumentationLine('=head2 Still POD')).to.equal(false);
    expect(tracker.consumeDocumentationLine('=cutting')).to.equal(false);
    expect(tracker.consumeDocumentationLine('=cut back to code')).to.equal(true);
    expect(tracker.inDocumentation).to.equal(false);
  });

  it('drains queued heredocs in FIFO order', () => {
    const tracker = new MultilineConstructTracker();
    tracker.enqueueLiteral({
      terminator: 'ONE',
      quoting: 'bare',
      indented: false,
      declarationLine: 4,
    });
    tracker.enqueueLiteral({
      terminator: 'TWO',
      quoting: 'single',
      indented: true,
      declarationLine: 4,
    });
    expect(tracker.pendingLiteralCount).to.equal(2);

    expect(tracker.consumeLiteralLine('TWO')).to.deep.equal({
      owningLine: 4,
      terminated: false,
    });
    expect(tracker.consumeLiteralLine('ONE')).to.deep.equal({
      owningLine: 4,
      terminated: true,
    });
    expect(tracker.consumeLiteralLine('\t  TWO')).to.deep.equal({
      owningLine: 4,
      terminated: true,
    });
    expect(tracker.hasPendingLiterals).to.equal(false);
    expect(tracker.pendingDiagnostics()).to.deep.equal([]);
  });

  it('lists every construct left open', () => {
    const tracker = new MultilineConstructTracker();
    tracker.enqueueLiteral({
      terminator: 'END',
      quoting: 'double',
      indented: false,
      declarationLine: 9,
    });
    tracker.enterDocumentation(2);
    expect(tracker.pendingDiagnostics()).to.deep.equal([
      { line: 2, message: 'POD block is not closed by =cut before end of file' },
      {
        line: 9,
        message: "Heredoc terminator 'END' not found before end of file",
      },
    ]);
  });
});

describe('isPodCut', () => {
  it('matches =cut as a whole word', () => {
    expect(isPodCut('=cut')).to.equal(true);
    expect(isPodCut('=cut ')).to.equal(true);
    expect(isPodCut('=cuts')).to.equal(false);
    expect(isPodCut(' =cut')).to.equal(false);
  });
});
