import pc from 'picocolors';
import type { DocumentSummary, SkippedFile } from '@repo-blob/packager';

export interface PackOutput {
  kind: 'pack';
  outputPath: string;
  bytes: number;
  summary: DocumentSummary;
  skipped: SkippedFile[];
}

export interface UploadOutput {
  kind: 'upload';
  blobId: string;
  source: string;
  url: string;
}

export interface RecordOutput {
  kind: 'record';
  label: string;
  repository: string;
  cid: string;
  transactionHash?: string;
  explorerLink?: string;
}

export interface RunOutput {
  kind: 'run';
  status: 'SUCCESS';
  runId: string;
  blobId: string;
  url: string;
  summary: DocumentSummary;
  recordUpdated: boolean;
  explorerLink?: string;
  /** Path of the output document when it was kept */
  artifactPath?: string;
  durationMs: number;
}

export type OutputResult = PackOutput | UploadOutput | RecordOutput | RunOutput;

const MAX_LISTED_SKIPS = 10;

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(data: OutputResult): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
      return;
    }
    switch (data.kind) {
      case 'pack':
        this.renderPack(data);
        break;
      case 'upload':
        this.renderUpload(data);
        break;
      case 'record':
        this.renderRecord(data);
        break;
      case 'run':
        this.renderRun(data);
        break;
    }
  }

  private renderPack(data: PackOutput): void {
    console.log(pc.green(`✅ Created ${data.outputPath} with ${data.summary.totalFiles} files`));
    console.log(`📦 Total size: ${data.summary.totalSize} bytes`);
    this.renderBreakdown(data.summary);

    if (data.skipped.length > 0) {
      console.log(pc.bold('\nSkipped:'));
      data.skipped
        .slice(0, MAX_LISTED_SKIPS)
        .forEach((s) => console.log(`  - ${s.path} ${pc.gray(`(${s.reason})`)}`));
      if (data.skipped.length > MAX_LISTED_SKIPS) {
        console.log(`  ... and ${data.skipped.length - MAX_LISTED_SKIPS} more.`);
      }
    }
  }

  private renderUpload(data: UploadOutput): void {
    console.log(pc.green(`✅ Extracted Blob ID: ${data.blobId}`));
    console.log(`📄 Access your codebase at: ${data.url}`);
  }

  private renderRecord(data: RecordOutput): void {
    console.log(pc.green('✅ Successfully updated ENS text record!'));
    console.log(`  ${pc.bold('Label:')} ${data.label}`);
    console.log(`  ${pc.bold('Repository:')} ${data.repository}`);
    console.log(`  ${pc.bold('CID:')} ${data.cid}`);
    if (data.explorerLink) {
      console.log(`🔗 Transaction: ${data.explorerLink}`);
    }
  }

  private renderRun(data: RunOutput): void {
    console.log(`\n${pc.green('✅ Run succeeded.')}`);
    console.log(pc.bold('\nBlob:'));
    console.log(`  ID: ${data.blobId}`);
    console.log(`  URL: ${data.url}`);

    console.log(pc.bold('\nPackage:'));
    console.log(`  Files: ${data.summary.totalFiles} (${data.summary.totalSize} bytes)`);
    this.renderBreakdown(data.summary);

    console.log(pc.bold('\nName record:'));
    if (!data.recordUpdated) {
      console.log(pc.gray('  Not updated.'));
    } else if (data.explorerLink) {
      console.log(`  Transaction: ${data.explorerLink}`);
    } else {
      console.log('  Updated.');
    }

    if (data.artifactPath) {
      console.log(`\nDocument kept at ${pc.cyan(data.artifactPath)}`);
    }
  }

  private renderBreakdown(summary: DocumentSummary): void {
    console.log(
      pc.gray(`  text: ${summary.text}, binary: ${summary.binary}, error: ${summary.error}`),
    );
  }
}
